import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
    ApiError,
    FileState,
    FinishReason,
    GenerateContentResponse,
    GoogleGenAI,
    Part,
    createPartFromText,
    createPartFromUri,
} from '@google/genai';
import { googleConfig } from '../../config/google.config';
import { DocumentHandle, HandleState } from '../knowledge/types';
import { GenerationCallError } from './gemini.errors';
import { GenerationClient, GenerationOutcome, GenerationPart, SubmitDocumentInput } from './generation.client';

const SAFETY_FINISH_REASONS: ReadonlySet<FinishReason> = new Set([
    FinishReason.SAFETY,
    FinishReason.BLOCKLIST,
    FinishReason.PROHIBITED_CONTENT,
    FinishReason.SPII,
]);

export function toHandleState(state: FileState | undefined): HandleState {
    switch (state) {
        case FileState.ACTIVE:
            return 'READY';
        case FileState.FAILED:
            return 'FAILED';
        default:
            return 'PENDING';
    }
}

export function toRequestParts(parts: GenerationPart[]): Part[] {
    return parts.map(part =>
        part.kind === 'text'
            ? createPartFromText(part.text)
            : createPartFromUri(part.handle.uri, part.handle.mimeType),
    );
}

export function interpretResponse(response: GenerateContentResponse): GenerationOutcome {
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
        return { kind: 'blocked', reason: String(blockReason) };
    }
    const text = response.text;
    if (text && text.trim()) {
        return { kind: 'text', text };
    }
    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && SAFETY_FINISH_REASONS.has(finishReason)) {
        return { kind: 'blocked', reason: String(finishReason) };
    }
    throw new GenerationCallError(`Empty response (finish reason: ${finishReason ?? 'unknown'})`, false);
}

export function isRateLimited(error: unknown): boolean {
    if (error instanceof ApiError) {
        return error.status === 429;
    }
    const message = error instanceof Error ? error.message : String(error);
    return message.includes('429') || message.includes('RESOURCE_EXHAUSTED');
}

@Injectable()
export class GeminiService extends GenerationClient {
    private readonly logger = new Logger(GeminiService.name);
    private genAI?: GoogleGenAI;

    constructor(@Inject(googleConfig.KEY) private readonly settings: ConfigType<typeof googleConfig>) {
        super();
    }

    private client(): GoogleGenAI {
        if (!this.genAI) {
            if (!this.settings.geminiApiKey) throw new Error('GEMINI_API_KEY is not set');
            this.genAI = new GoogleGenAI({ apiKey: this.settings.geminiApiKey });
        }
        return this.genAI;
    }

    async submitDocument(input: SubmitDocumentInput): Promise<DocumentHandle> {
        const file = await this.client().files.upload({
            file: input.path,
            config: { displayName: input.displayName, mimeType: input.mimeType },
        });
        if (!file.name || !file.uri) {
            throw new Error(`Upload of ${input.displayName} returned no file name or uri`);
        }
        return {
            name: file.name,
            uri: file.uri,
            mimeType: file.mimeType ?? input.mimeType,
            displayName: file.displayName ?? input.displayName,
            state: toHandleState(file.state),
        };
    }

    async getHandleState(handle: DocumentHandle): Promise<HandleState> {
        const file = await this.client().files.get({ name: handle.name });
        return toHandleState(file.state);
    }

    async releaseDocument(handle: DocumentHandle): Promise<void> {
        await this.client().files.delete({ name: handle.name });
        this.logger.debug(`Deleted ${handle.name} (${handle.displayName})`);
    }

    async generate(parts: GenerationPart[]): Promise<GenerationOutcome> {
        let response: GenerateContentResponse;
        try {
            response = await this.client().models.generateContent({
                model: this.settings.chatModel,
                contents: toRequestParts(parts),
                config: { ...this.settings.generation },
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new GenerationCallError(`Failed to generate content: ${message}`, isRateLimited(error), { cause: error });
        }
        return interpretResponse(response);
    }
}
