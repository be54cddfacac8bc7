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
import { ADDRESS } from './entities.registry';
import { mapDomainError } from './internal/http-errors';
import { CreateAddressRequestDto } from './dto/CreateAddress.request.dto';
import { UpdateAddressRequestDto } from './dto/UpdateAddress.request.dto';
import type {
  EntityItemDto,
  ListEntitiesResponseDto,
} from './dto/ListEntities.response.dto';
import type { DeleteEntityResponseDto } from './dto/DeleteEntity.response.dto';

@Controller('api/addresses')
export class AddressesController {
  constructor(private readonly svc: EntitiesService) {}

  @Get()
  async list(
    @Query() query: Record<string, unknown>,
  ): Promise<ListEntitiesResponseDto> {
    try {
      return await this.svc.list(ADDRESS, query);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<EntityItemDto> {
    try {
      return await this.svc.get(ADDRESS, id);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Post()
  async create(@Body() body: CreateAddressRequestDto): Promise<EntityItemDto> {
    try {
      return await this.svc.create(ADDRESS, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  /** Full replacement: every writable field is required. */
  @Put(':id')
  async replace(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: CreateAddressRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(ADDRESS, id, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateAddressRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(ADDRESS, id, body);
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
      return await this.svc.remove(ADDRESS, id);
    } catch (err) {
      mapDomainError(err);
    }
  }
}
