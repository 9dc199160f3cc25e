import { Module } from '@nestjs/common';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { AssistantController } from './assistant.controller';
import { CommandService } from './command.service';

@Module({
  imports: [SchedulingModule],
  providers: [CommandService],
  controllers: [AssistantController],
  exports: [CommandService],
})
export class CommandsModule {}
