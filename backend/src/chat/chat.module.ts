import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { AssistantController } from './assistant.controller.js';
import { ChatController } from './chat.controller.js';
import { ChatService } from './chat.service.js';
import { SessionRegistry } from './session-registry.service.js';

@Module({
  imports: [AiModule, KnowledgeModule],
  providers: [ChatService, SessionRegistry],
  controllers: [ChatController, AssistantController],
  exports: [ChatService, SessionRegistry],
})
export class ChatModule {}
