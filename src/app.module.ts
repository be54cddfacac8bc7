// src/app.module.ts
import { Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { mongoConfig } from './infra/mongo/mongo.config';
import { HttpErrorFilter } from './lib/errors/HttpErrorFilter';
import { ValidationHttpException } from './lib/errors/ValidationHttpException';
import { entitiesConfig } from './modules/entities/entities.config';
import { EntitiesModule } from './modules/entities/entities.module';
import { HealthModule } from './modules/health/health.module';
import { MongodbModule } from './modules/mongodb/mongodb.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [mongoConfig, entitiesConfig] }),
    MongodbModule,
    EntitiesModule,
    HealthModule,
  ],
  providers: [
    // Registered here (not in main.ts) so test apps get the same pipe/filter.
    {
      provide: APP_PIPE,
      useFactory: () =>
        new ValidationPipe({
          whitelist: true,
          transform: true,
          forbidUnknownValues: false,
          exceptionFactory: (errors) =>
            ValidationHttpException.fromValidationErrors(errors),
        }),
    },
    { provide: APP_FILTER, useClass: HttpErrorFilter },
  ],
})
export class AppModule {}
