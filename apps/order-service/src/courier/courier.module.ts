import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { CourierDirectoryService } from './courier-directory.service';
import { CourierController } from './courier.controller';

@Module({
  imports: [PersistenceModule, CollaboratorsModule],
  controllers: [CourierController],
  providers: [CourierDirectoryService],
  exports: [CourierDirectoryService],
})
export class CourierModule {}
