import { Module } from '@nestjs/common';
import { TelegramService } from './telegram.service';
import { TelegramController } from './telegram.controller';
import { CalendarModule } from '../calendar/calendar.module';
import { CommandsModule } from '../commands/commands.module';
import { SchedulingModule } from '../scheduling/scheduling.module';

@Module({
  imports: [CalendarModule, SchedulingModule, CommandsModule],
  providers: [TelegramService],
  controllers: [TelegramController],
})
export class TelegramModule {}
