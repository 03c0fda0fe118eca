import { ContextOverflowError } from '../../errors/ChatError';
import { makeConfig } from '../../test/fixtures';
import { Turn } from '../../types/chat';
import { estimateTokens } from '../../utils/tokens';
import { buildGenerationRequest, messageBudget, PromptAssembler, PromptOptions } from './PromptAssembler';

// 40 bytes -> 10 tokens each.
const tenTokens = (label: string) => label.padEnd(40, '.');

function turn(role: Turn['role'], text: string): Turn {
    return { role, text, timestamp: new Date(0) };
}

function options(messageSpace: number): PromptOptions {
    return {
        limits: { maxContextTokens: messageSpace + 30, systemReserve: 10, responseReserve: 20 },
        systemPrompt: 'System says {{max_tokens}}.',
        maxTokens: 256,
        temperature: 0.5,
        topP: 0.9,
    };
}

describe('estimateTokens', () => {
    it('counts four bytes per token with a floor of one', () => {
        expect(estimateTokens('')).toBe(1);
        expect(estimateTokens('abc')).toBe(1);
        expect(estimateTokens('abcdefgh')).toBe(2);
        expect(estimateTokens(tenTokens('x'))).toBe(10);
        // Two bytes per character in UTF-8.
        expect(estimateTokens('éééé')).toBe(2);
    });
});

describe('buildGenerationRequest', () => {
    const history: Turn[] = [
        turn('user', tenTokens('u1')),
        turn('assistant', tenTokens('a1')),
        turn('user', tenTokens('u2')),
        turn('assistant', tenTokens('a2')),
    ];

    it('keeps the whole history when it fits', () => {
        const request = buildGenerationRequest(history, tenTokens('new'), options(100));

        expect(request.messages.map((message) => message.role)).toEqual([
            'system',
            'user',
            'assistant',
            'user',
            'assistant',
            'user',
        ]);
        expect(request.messages[0].content).toBe('System says 256.');
        expect(request.messages[5].content).toBe(tenTokens('new'));
        expect(request.estimatedTokens).toBe(50);
        expect(request.droppedTurns).toBe(0);
        expect(request).toMatchObject({ maxTokens: 256, temperature: 0.5, topP: 0.9 });
    });

    it('drops whole turns from the oldest end to stay within budget', () => {
        const request = buildGenerationRequest(history, tenTokens('new'), options(35));

        expect(request.messages.slice(1).map((message) => message.content)).toEqual([
            tenTokens('u2'),
            tenTokens('a2'),
            tenTokens('new'),
        ]);
        expect(request.droppedTurns).toBe(2);
        expect(request.estimatedTokens).toBe(30);
        expect(request.estimatedTokens).toBeLessThanOrEqual(messageBudget(options(35).limits));
    });

    it('stops at the first turn that does not fit instead of skipping it', () => {
        const uneven: Turn[] = [
            turn('user', 'hi'),
            turn('assistant', tenTokens('long').repeat(3)),
            turn('user', tenTokens('u2')),
        ];

        const request = buildGenerationRequest(uneven, tenTokens('new'), options(25));

        expect(request.messages.slice(1).map((message) => message.content)).toEqual([
            tenTokens('u2'),
            tenTokens('new'),
        ]);
        expect(request.droppedTurns).toBe(2);
    });

    it('sends only the new message when nothing else fits', () => {
        const request = buildGenerationRequest(history, tenTokens('new'), options(10));

        expect(request.messages).toEqual([
            { role: 'system', content: 'System says 256.' },
            { role: 'user', content: tenTokens('new') },
        ]);
        expect(request.droppedTurns).toBe(4);
    });

    it('rejects a message that alone exceeds the budget', () => {
        const build = () => buildGenerationRequest([], tenTokens('new'), options(9));

        expect(build).toThrow(ContextOverflowError);
        expect(build).toThrow('Message is too long: it needs about 10 tokens but only 9 fit in the context window');
    });

    it('does not modify the transcript it was given', () => {
        const transcript = [...history];
        buildGenerationRequest(transcript, 'new', options(15));

        expect(transcript).toEqual(history);
    });
});

describe('PromptAssembler', () => {
    const assembler = new PromptAssembler(makeConfig());

    it('uses the default max tokens when none is requested', () => {
        expect(assembler.resolveMaxTokens()).toBe(512);
    });

    it('clamps requested max tokens into the configured range', () => {
        expect(assembler.resolveMaxTokens(10)).toBe(100);
        expect(assembler.resolveMaxTokens(1000)).toBe(1000);
        expect(assembler.resolveMaxTokens(99_999)).toBe(4096);
    });

    it('builds with the configured sampling parameters', () => {
        const request = assembler.build([], 'Hi', 300);

        expect(request.messages).toEqual([
            { role: 'system', content: 'Be helpful. Up to 300 tokens.' },
            { role: 'user', content: 'Hi' },
        ]);
        expect(request).toMatchObject({ maxTokens: 300, temperature: 0.7, topP: 0.95 });
    });
});
