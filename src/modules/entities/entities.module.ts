import { Module } from '@nestjs/common';
import { EntityRegistry } from '../../lib/query';
import { MongodbModule } from '../mongodb/mongodb.module'; // imports provider for MongodbService
import { AddressesController } from './addresses.controller';
import { createEntityRegistry } from './entities.registry';
import { EntitiesService } from './entities.service';
import { PersonsController } from './persons.controller';
import { PhonesController } from './phones.controller';

@Module({
  imports: [MongodbModule],
  controllers: [PersonsController, AddressesController, PhonesController],
  providers: [
    { provide: EntityRegistry, useFactory: createEntityRegistry },
    EntitiesService,
  ],
  exports: [EntitiesService],
})
export class EntitiesModule {}
