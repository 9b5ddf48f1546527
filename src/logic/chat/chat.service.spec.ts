import { KnowledgeHarness, createKnowledgeHarness } from '../../testing/fakes';
import { GenerationCallError } from '../gemini/gemini.errors';
import { GenerationPart } from '../gemini/generation.client';
import { ConversationTurn } from './dto/chat.dto';
import { DEFAULT_PERSONAS, FALLBACK_MESSAGES, GROUNDING_RULES } from './prompt';

const textOf = (part: GenerationPart | undefined) => (part?.kind === 'text' ? part.text : undefined);
const documentNames = (parts: GenerationPart[]) =>
    parts.flatMap(p => (p.kind === 'document' ? [p.handle.displayName] : []));

describe('ChatService', () => {
    let h: KnowledgeHarness;

    beforeEach(async () => {
        h = await createKnowledgeHarness();
        h.store.addFolder('Student', [
            { id: 's1', name: 'Rules.pdf' },
            { id: 's2', name: 'Calendar.pdf' },
        ]);
        h.store.addFolder('Prospective', [{ id: 'p1', name: 'Brochure.pdf' }]);
        await h.sync.sync();
    });

    it('orders instruction, role documents and question', async () => {
        const parts = h.chat.assemble('Student', 'When does term start?', []);

        expect(parts).toHaveLength(4);
        expect(textOf(parts[0])).toBe(
            `${GROUNDING_RULES}\n\n[Persona]\n${DEFAULT_PERSONAS.Student}\n\n[Conversation so far]\n`,
        );
        expect(documentNames(parts)).toEqual(['Rules.pdf', 'Calendar.pdf']);
        expect(textOf(parts[3])).toBe('[User question]\nWhen does term start?');
    });

    it('keeps only the most recent turns of the history, oldest first', () => {
        const history: ConversationTurn[] = [
            { role: 'user', text: 'q1' },
            { role: 'assistant', text: 'a1' },
            { role: 'user', text: 'q2' },
            { role: 'assistant', text: 'a2' },
            { role: 'user', text: 'q3' },
            { role: 'assistant', text: 'a3' },
        ];

        const instruction = textOf(h.chat.assemble('Student', 'next?', history)[0]);

        expect(instruction?.endsWith('[Conversation so far]\nUser: q2\nAssistant: a2\nUser: q3\nAssistant: a3')).toBe(true);
        expect(instruction).not.toContain('User: q1');
        expect(instruction).not.toContain('Assistant: a1');
    });

    it('gives an unknown role no documents and no persona', () => {
        const parts = h.chat.assemble('Alumni', 'Is there a reunion?', []);

        expect(documentNames(parts)).toEqual([]);
        expect(parts).toHaveLength(2);
        expect(textOf(parts[0])).toBe(`${GROUNDING_RULES}\n\n[Conversation so far]\n`);
    });

    it('uses configured personas over the built-in ones', async () => {
        const custom = await createKnowledgeHarness({ personas: { Student: 'Answer like a homeroom teacher.' } });

        const instruction = textOf(custom.chat.assemble('Student', 'Hi', [])[0]);

        expect(instruction).toContain('[Persona]\nAnswer like a homeroom teacher.');
        expect(instruction).not.toContain(DEFAULT_PERSONAS.Student);
    });

    it('does not treat object prototype keys as personas', () => {
        const instruction = textOf(h.chat.assemble('constructor', 'Hi', [])[0]);

        expect(instruction).not.toContain('[Persona]');
    });

    it('returns the answer and records it in the chat log', async () => {
        h.generation.nextOutcome = { kind: 'text', text: 'Term starts on 8 April (Calendar.pdf, p. 1).' };

        const answer = await h.chat.answer('Student', 'When does term start?');

        expect(answer).toEqual({ text: 'Term starts on 8 April (Calendar.pdf, p. 1).', outcome: 'answered' });
        expect(h.generation.generateCalls).toHaveLength(1);
        expect(h.chatLog.entries).toHaveLength(1);
        expect(h.chatLog.entries[0]).toMatchObject({
            role: 'Student',
            question: 'When does term start?',
            answer: 'Term starts on 8 April (Calendar.pdf, p. 1).',
        });
        expect(h.chatLog.entries[0].timestamp).toBeInstanceOf(Date);
    });

    it('replaces a safety block with the fixed message and still logs it', async () => {
        h.generation.nextOutcome = { kind: 'blocked', reason: 'SAFETY' };

        const answer = await h.chat.answer('Student', 'something unsafe');

        expect(answer).toEqual({ text: FALLBACK_MESSAGES.blocked, outcome: 'blocked' });
        expect(h.chatLog.entries.map(e => e.answer)).toEqual([FALLBACK_MESSAGES.blocked]);
    });

    it('asks the user to retry later when rate limited', async () => {
        h.generation.nextOutcome = new GenerationCallError('Failed to generate content: 429 Too Many Requests', true);

        const answer = await h.chat.answer('Student', 'When does term start?');

        expect(answer).toEqual({ text: FALLBACK_MESSAGES.rateLimited, outcome: 'rate_limited' });
        expect(h.chatLog.entries).toEqual([]);
    });

    it('hides other failures behind the generic message', async () => {
        h.generation.nextOutcome = new Error('socket hang up at 10.0.0.3');

        const answer = await h.chat.answer('Student', 'When does term start?');

        expect(answer).toEqual({ text: FALLBACK_MESSAGES.failed, outcome: 'failed' });
        expect(h.chatLog.entries).toEqual([]);
    });

    it('answers even when the chat log rejects', async () => {
        h.chatLog.failure = new Error('Sheets quota exceeded');

        const answer = await h.chat.answer('Student', 'When does term start?');
        await new Promise(resolve => setImmediate(resolve));

        expect(answer.outcome).toBe('answered');
        expect(answer.text).toBe('Test answer');
    });

    it('answers even when the chat log throws synchronously', async () => {
        jest.spyOn(h.chatLog, 'append').mockImplementation(() => {
            throw new Error('not connected');
        });

        const answer = await h.chat.answer('Student', 'When does term start?');

        expect(answer.outcome).toBe('answered');
    });

    it('reads the snapshot published at call time', async () => {
        h.store.addFolder('Guardian', [{ id: 'g1', name: 'Fees.pdf' }]);
        expect(documentNames(h.chat.assemble('Guardian', 'Fees?', []))).toEqual([]);

        await h.sync.sync();

        expect(documentNames(h.chat.assemble('Guardian', 'Fees?', []))).toEqual(['Fees.pdf']);
    });
});
