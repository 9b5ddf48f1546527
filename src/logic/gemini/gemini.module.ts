import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { GenerationClient } from './generation.client';

@Module({
    providers: [GeminiService, { provide: GenerationClient, useExisting: GeminiService }],
    exports: [GenerationClient],
})
export class GeminiModule {}
