import { Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { mongoConfig } from '../../infra/mongo/mongo.config';
import { LazyMongoClient } from './internal';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module.
 * - Provides a thin, typed bridge to the native MongoDB driver.
 * - The client is built from injected config; nothing connects at import time.
 * - No controllers (not exposed over HTTP).
 */
@Module({
  providers: [
    {
      provide: LazyMongoClient,
      inject: [mongoConfig.KEY],
      useFactory: (cfg: ConfigType<typeof mongoConfig>) =>
        new LazyMongoClient(cfg.uri),
    },
    MongodbService,
  ],
  exports: [MongodbService],
})
export class MongodbModule {}
