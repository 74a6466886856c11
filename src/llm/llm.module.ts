import { Module } from '@nestjs/common';
import { LlmCacheService } from './services/llm-cache.service';
import { OllamaClientService } from './services/ollama-client.service';

@Module({
  providers: [LlmCacheService, OllamaClientService],
  exports: [LlmCacheService, OllamaClientService],
})
export class LlmModule {}
