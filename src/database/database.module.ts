import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pipeline, PipelineRun, LaneRecord, StageResultRecord, LaneLog } from './entities';
import { DatabaseSeedService } from './database-seed.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.getOrThrow<string>('DATABASE_URL'),
        entities: [Pipeline, PipelineRun, LaneRecord, StageResultRecord, LaneLog],
        // Only one process should synchronize the database (see SYNC_DATABASE)
        synchronize: config.get('SYNC_DATABASE') !== 'false',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}
