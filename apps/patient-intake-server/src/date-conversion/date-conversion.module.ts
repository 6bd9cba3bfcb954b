import { Module } from '@nestjs/common';
import { DateConverterService } from './date-converter.service';
import { CLOCK, systemClock } from './date-converter.types';

@Module({
  providers: [{ provide: CLOCK, useValue: systemClock }, DateConverterService],
  exports: [DateConverterService],
})
export class DateConversionModule {}
