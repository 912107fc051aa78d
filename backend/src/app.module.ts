import { Module } from '@nestjs/common';
import { NetAssistConfigModule } from './config/index.js';
import { AiModule } from './ai/index.js';
import { KnowledgeModule } from './knowledge/index.js';
import { ChatModule } from './chat/index.js';

@Module({
  imports: [NetAssistConfigModule, AiModule, KnowledgeModule, ChatModule],
})
export class AppModule {}
