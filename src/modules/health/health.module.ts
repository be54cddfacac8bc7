import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [MongodbModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
