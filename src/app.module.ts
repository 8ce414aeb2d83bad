import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ReconcilerModule } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ReconcilerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        storage: {
          // typeorm reads DB_* from the environment
          type: config.get<string>('ORDER_STORE') === 'typeorm' ? 'typeorm' : 'memory',
        },
        webhooks: {
          timeoutMs: Number(config.get<string>('WEBHOOK_TIMEOUT_MS') ?? 30000),
        },
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
