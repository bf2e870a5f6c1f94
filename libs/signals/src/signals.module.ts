import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { LiveRunnerFactory } from './live/live-runner.factory';

@Module({
  imports: [CoreModule],
  providers: [LiveRunnerFactory],
  exports: [LiveRunnerFactory],
})
export class SignalsModule {}
