import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { validateEnvironment } from './config/env.validation';
import { CalendarModule } from './calendar/calendar.module';
import { CommandsModule } from './commands/commands.module';
import { SchedulingModule } from './scheduling/scheduling.module';
import { TelegramModule } from './telegram/telegram.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    ScheduleModule.forRoot(),
    CalendarModule,
    SchedulingModule,
    CommandsModule,
    TelegramModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
