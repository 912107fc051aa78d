import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { knowledgeLookupRequestSchema } from '@netassist/types';
import { parsePayload } from '../common/parse-payload.js';
import { KnowledgeService } from './knowledge.service.js';

@Controller('api/v1/knowledge')
export class KnowledgeController {
  constructor(private readonly knowledgeService: KnowledgeService) {}

  @Get('guides')
  listGuides() {
    return { data: this.knowledgeService.listGuides() };
  }

  @Post('lookup')
  @HttpCode(HttpStatus.OK)
  lookup(@Body() body: unknown) {
    const payload = parsePayload(knowledgeLookupRequestSchema, body);
    return { data: this.knowledgeService.lookup(payload.query) };
  }
}
