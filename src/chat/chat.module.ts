import { Module } from '@nestjs/common';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { RequestTransformerService } from './services/request-transformer.service';
import { StreamTransformerService } from './services/stream-transformer.service';

@Module({
  controllers: [ChatController],
  providers: [ChatService, RequestTransformerService, StreamTransformerService],
  exports: [ChatService],
})
export class ChatModule {}
