import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ExtractionRun } from './extraction-run.entity';
import { TransitionsService } from './transitions.service';
import { TransitionsController } from './transitions.controller';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([ExtractionRun])],
  providers: [TransitionsService],
  controllers: [TransitionsController],
  exports: [TransitionsService],
})
export class TransitionsModule {}
