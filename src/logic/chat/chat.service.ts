import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { knowledgeConfig } from '../../config/knowledge.config';
import { LogSinkError } from '../chat-log/chat-log.errors';
import { ChatLogSink } from '../chat-log/chat-log.sink';
import { GenerationBlockedError, GenerationCallError } from '../gemini/gemini.errors';
import { GenerationClient, GenerationPart } from '../gemini/generation.client';
import { KnowledgeCacheService } from '../knowledge/knowledge-cache.service';
import { describeError } from '../knowledge/knowledge.errors';
import { RoleTag } from '../knowledge/types';
import { ConversationTurn } from './dto/chat.dto';
import {
    DEFAULT_PERSONAS,
    FALLBACK_MESSAGES,
    buildInstruction,
    buildQuestion,
    renderHistory,
    truncateHistory,
} from './prompt';

export type ChatOutcome = 'answered' | 'blocked' | 'rate_limited' | 'failed';

export interface ChatAnswer {
    text: string;
    outcome: ChatOutcome;
}

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly personas: Map<RoleTag, string>;

    constructor(
        private readonly cache: KnowledgeCacheService,
        private readonly generation: GenerationClient,
        private readonly chatLog: ChatLogSink,
        @Inject(knowledgeConfig.KEY) private readonly settings: ConfigType<typeof knowledgeConfig>,
    ) {
        this.personas = new Map(Object.entries({ ...DEFAULT_PERSONAS, ...settings.personas }));
    }

    /**
     * Builds the ordered request for one question: instruction text, the
     * role's documents in cache order, then the question.
     */
    assemble(role: RoleTag, question: string, history: readonly ConversationTurn[]): GenerationPart[] {
        const documents = this.cache.documentsFor(role, this.cache.snapshot());
        const turns = truncateHistory(history, this.settings.historyWindow);
        const instruction = buildInstruction(this.personas.get(role), renderHistory(turns));
        return [
            { kind: 'text', text: instruction },
            ...documents.map((handle): GenerationPart => ({ kind: 'document', handle })),
            { kind: 'text', text: buildQuestion(question) },
        ];
    }

    async answer(role: RoleTag, question: string, history: readonly ConversationTurn[] = []): Promise<ChatAnswer> {
        const parts = this.assemble(role, question, history);
        let answer: ChatAnswer;
        try {
            answer = { text: await this.invoke(parts), outcome: 'answered' };
        } catch (error) {
            answer = this.fallback(role, error);
        }
        if (answer.outcome === 'answered' || answer.outcome === 'blocked') {
            this.record(role, question, answer.text);
        }
        return answer;
    }

    private async invoke(parts: GenerationPart[]): Promise<string> {
        const outcome = await this.generation.generate(parts);
        if (outcome.kind === 'blocked') {
            throw new GenerationBlockedError(outcome.reason);
        }
        return outcome.text;
    }

    private fallback(role: RoleTag, error: unknown): ChatAnswer {
        if (error instanceof GenerationBlockedError) {
            this.logger.warn(`${error.message} (role ${role})`);
            return { text: FALLBACK_MESSAGES.blocked, outcome: 'blocked' };
        }
        if (error instanceof GenerationCallError && error.rateLimited) {
            this.logger.warn(`Rate limited (role ${role}): ${error.message}`);
            return { text: FALLBACK_MESSAGES.rateLimited, outcome: 'rate_limited' };
        }
        this.logger.error(`Generation failed (role ${role}): ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
        return { text: FALLBACK_MESSAGES.failed, outcome: 'failed' };
    }

    // Fire-and-forget: the reply never waits on, or fails because of, the log.
    private record(role: RoleTag, question: string, answer: string): void {
        let pending: Promise<void>;
        try {
            pending = this.chatLog.append({ timestamp: new Date(), role, question, answer });
        } catch (error) {
            pending = Promise.reject(error);
        }
        pending.catch((error: unknown) => {
            const failure = error instanceof LogSinkError ? error : new LogSinkError(describeError(error), { cause: error });
            this.logger.warn(`Chat log not saved: ${failure.message}`);
        });
    }
}
