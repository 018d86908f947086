import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApiModule } from '@risk-router/agent/api';
import configurations, { validateEnvironment } from '../environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: configurations,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    ApiModule,
  ],
})
export class AppModule {}
