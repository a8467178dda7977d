import { describe, expect, it } from 'vitest';
import type { MessageInfo } from '../types/index.js';
import { renderJson } from './json.js';

const message: MessageInfo = {
    kind: 'message',
    channel: 'harbour_news',
    id: 42,
    date: '2024-03-05 14:07:09 UTC',
    editDate: null,
    text: 'Привет 👋',
    views: null,
    forwards: null,
    replies: null,
    reactions: [],
    forwardedFrom: null,
    viaBotId: null,
    replyToMessageId: null,
    entities: { urls: [], mentions: [], hashtags: [] },
    media: null,
    raw: { className: 'Message', id: 42, message: 'Привет 👋' },
};

describe('renderJson', () => {
    it('produces parseable JSON with every field', () => {
        expect(JSON.parse(renderJson(message))).toEqual(message);
    });

    it('indents by two spaces', () => {
        expect(renderJson(message).split('\n')[1]).toBe('  "kind": "message",');
    });

    it('keeps non-ASCII text unescaped', () => {
        expect(renderJson(message)).toContain('"text": "Привет 👋"');
    });
});
