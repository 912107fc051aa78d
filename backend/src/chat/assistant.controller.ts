import { Controller, Get } from '@nestjs/common';
import type { AssistantProfile } from '@netassist/types';
import { AIService } from '../ai/index.js';

@Controller('api/v1/assistant')
export class AssistantController {
  constructor(private readonly aiService: AIService) {}

  @Get()
  getProfile(): { data: AssistantProfile } {
    return {
      data: {
        title: 'GenAI Network Troubleshooting Chatbot',
        greeting:
          "Hello! I'm your GenAI network assistant. I can help you troubleshoot common network issues.",
        inputPlaceholder: 'How can I help you with your network issue?',
        provider: this.aiService.providerName,
        model: this.aiService.modelName,
      },
    };
  }
}
