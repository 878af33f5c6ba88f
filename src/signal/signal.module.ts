import { Module } from '@nestjs/common';

import { SignalGeneratorService } from './signal-generator.service';

@Module({
  providers: [SignalGeneratorService],
  exports: [SignalGeneratorService],
})
export class SignalModule {}
