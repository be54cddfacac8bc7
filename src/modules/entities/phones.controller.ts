import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { EntitiesService } from './entities.service';
import { PHONE } from './entities.registry';
import { mapDomainError } from './internal/http-errors';
import { CreatePhoneRequestDto } from './dto/CreatePhone.request.dto';
import { UpdatePhoneRequestDto } from './dto/UpdatePhone.request.dto';
import type {
  EntityItemDto,
  ListEntitiesResponseDto,
} from './dto/ListEntities.response.dto';
import type { DeleteEntityResponseDto } from './dto/DeleteEntity.response.dto';

@Controller('api/phones')
export class PhonesController {
  constructor(private readonly svc: EntitiesService) {}

  @Get()
  async list(
    @Query() query: Record<string, unknown>,
  ): Promise<ListEntitiesResponseDto> {
    try {
      return await this.svc.list(PHONE, query);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<EntityItemDto> {
    try {
      return await this.svc.get(PHONE, id);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Post()
  async create(@Body() body: CreatePhoneRequestDto): Promise<EntityItemDto> {
    try {
      return await this.svc.create(PHONE, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Put(':id')
  async replace(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: CreatePhoneRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(PHONE, id, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdatePhoneRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(PHONE, id, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Delete(':id')
  @HttpCode(200)
  async remove(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DeleteEntityResponseDto> {
    try {
      return await this.svc.remove(PHONE, id);
    } catch (err) {
      mapDomainError(err);
    }
  }
}
