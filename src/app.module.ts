import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HealthModule } from './health/health.module';
import { TransitionsModule } from './transitions/transitions.module';
import { ExtractionRun } from './transitions/extraction-run.entity';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        type: 'sqljs',
        location: cfg.get<string>('SQLITE_DB') || 'db.sqlite',
        autoSave: true,
        entities: [ExtractionRun],
        synchronize: true,
      }),
    }),
    HealthModule,
    TransitionsModule,
  ],
})
export class AppModule {}
