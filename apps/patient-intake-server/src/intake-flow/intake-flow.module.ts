import { Module } from '@nestjs/common';
import { AddressValidationModule } from '../address-validation/address-validation.module';
import { DateConversionModule } from '../date-conversion/date-conversion.module';
import { NotificationModule } from '../notification/notification.module';
import { IntakeFlowFactoryService } from './intake-flow-factory.service';

@Module({
  imports: [AddressValidationModule.registerAsync(), DateConversionModule, NotificationModule.registerAsync()],
  providers: [IntakeFlowFactoryService],
  exports: [IntakeFlowFactoryService],
})
export class IntakeFlowModule {}
