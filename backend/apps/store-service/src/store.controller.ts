import {
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import {
  RESILIENT_STORE,
  ResilientStore,
  decodeJson,
} from '../../../libs/resilient-store';

@Controller('store')
export class StoreController {
  constructor(
    @Inject(RESILIENT_STORE) private readonly store: ResilientStore,
  ) {}

  // GET /store?pattern=policy:*
  @Get()
  async scan(@Query('pattern') pattern?: string) {
    const values: unknown[] = [];
    for await (const bytes of this.store.scan(pattern || '*')) {
      values.push(decodeJson(bytes));
    }
    return values;
  }

  @Get(':key')
  async get(@Param('key') key: string) {
    const bytes = await this.store.get(key);
    if (bytes === null) {
      throw new NotFoundException(`Key '${key}' not found`);
    }
    return { key, value: decodeJson(bytes) };
  }

  @Put(':key')
  async set(@Param('key') key: string, @Body() value: unknown) {
    await this.store.set(key, value);
    return { key };
  }

  // Create only; 409 when the key already holds a value
  @Post(':key')
  async create(@Param('key') key: string, @Body() value: unknown) {
    const created = await this.store.setIfAbsent(key, value);
    if (!created) {
      throw new ConflictException(`Key '${key}' already exists`);
    }
    return { key, created };
  }

  @Delete(':key')
  @HttpCode(204)
  async delete(@Param('key') key: string) {
    await this.store.delete(key);
  }
}
