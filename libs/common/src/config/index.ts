import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import appConfig from './app.config';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [appConfig],
    }),
  ],
  exports: [NestConfigModule],
})
export class ConfigModule {}

export { appConfig };
export { logLevelsFor } from './log-levels';
