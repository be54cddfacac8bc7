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
import { PERSON } from './entities.registry';
import { mapDomainError } from './internal/http-errors';
import { CreatePersonRequestDto } from './dto/CreatePerson.request.dto';
import { UpdatePersonRequestDto } from './dto/UpdatePerson.request.dto';
import type {
  EntityItemDto,
  ListEntitiesResponseDto,
} from './dto/ListEntities.response.dto';
import type { DeleteEntityResponseDto } from './dto/DeleteEntity.response.dto';

@Controller('api/persons')
export class PersonsController {
  constructor(private readonly svc: EntitiesService) {}

  /** Filters, search, sort and paging come from the query string. */
  @Get()
  async list(
    @Query() query: Record<string, unknown>,
  ): Promise<ListEntitiesResponseDto> {
    try {
      return await this.svc.list(PERSON, query);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<EntityItemDto> {
    try {
      return await this.svc.get(PERSON, id);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Post()
  async create(@Body() body: CreatePersonRequestDto): Promise<EntityItemDto> {
    try {
      return await this.svc.create(PERSON, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  /** Full replacement: every writable field is required. */
  @Put(':id')
  async replace(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: CreatePersonRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(PERSON, id, body);
    } catch (err) {
      mapDomainError(err);
    }
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdatePersonRequestDto,
  ): Promise<EntityItemDto> {
    try {
      return await this.svc.update(PERSON, id, body);
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
      return await this.svc.remove(PERSON, id);
    } catch (err) {
      mapDomainError(err);
    }
  }
}
