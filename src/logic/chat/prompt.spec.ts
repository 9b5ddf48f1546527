import { buildInstruction, buildQuestion, renderHistory, truncateHistory } from './prompt';

describe('prompt helpers', () => {
    const history = [
        { role: 'user' as const, text: 'Hello' },
        { role: 'assistant' as const, text: 'Hi, how can I help?' },
        { role: 'user' as const, text: 'Bus times?' },
    ];

    it('truncates to the window and keeps order', () => {
        expect(truncateHistory(history, 2)).toEqual(history.slice(1));
        expect(truncateHistory(history, 10)).toEqual(history);
        expect(truncateHistory(history, 0)).toEqual([]);
    });

    it('renders labelled lines', () => {
        expect(renderHistory(history)).toBe('User: Hello\nAssistant: Hi, how can I help?\nUser: Bus times?');
        expect(renderHistory([])).toBe('');
    });

    it('adds the persona section only when there is one', () => {
        expect(buildInstruction('Be brief.', 'User: Hello')).toMatch(/\n\n\[Persona\]\nBe brief\.\n\n\[Conversation so far\]\nUser: Hello$/);
        expect(buildInstruction(undefined, '')).not.toContain('[Persona]');
    });

    it('prefixes the question', () => {
        expect(buildQuestion('Where is the gym?')).toBe('[User question]\nWhere is the gym?');
    });
});
