import { SSE_DONE_SENTINEL, SseChatChunkSchema } from '@chatsync/protocol';
import { DecodeError } from '@/errors';

export type StreamChunk = {
    delta: string;
    done: boolean;
    messageId?: string;
    /** Full message text, usually only on the terminal chunk. */
    content?: string;
};

export type SseLine =
    | { type: 'skip' }
    | { type: 'done' }
    | { type: 'chunk'; chunk: StreamChunk };

export function parseSseLine(rawLine: string): SseLine {
    const line = rawLine.trim();
    if (!line.startsWith('data:')) {
        return { type: 'skip' };
    }

    let data = line.slice('data:'.length);
    if (data.startsWith(' ')) {
        data = data.slice(1);
    }
    if (!data) {
        return { type: 'skip' };
    }
    if (data === SSE_DONE_SENTINEL) {
        return { type: 'done' };
    }

    let json: unknown;
    try {
        json = JSON.parse(data);
    } catch (error) {
        throw new DecodeError('Malformed stream event', { cause: error });
    }
    const parsed = SseChatChunkSchema.safeParse(json);
    if (!parsed.success) {
        throw new DecodeError(`Unexpected stream event: ${parsed.error.message}`);
    }

    const { delta, done, message_id: messageId, content } = parsed.data;
    return {
        type: 'chunk',
        chunk: {
            delta: delta ?? '',
            done: done ?? false,
            ...(messageId ? { messageId } : {}),
            ...(content != null ? { content } : {}),
        },
    };
}

/**
 * Turns SSE lines into chunks. Ends after the first terminal event; a bare
 * `[DONE]` sentinel is surfaced as an empty chunk with `done: true` so callers
 * only ever look at `done`.
 */
export async function* readSseChunks(lines: AsyncIterable<string>): AsyncGenerator<StreamChunk, void, undefined> {
    for await (const rawLine of lines) {
        const parsed = parseSseLine(rawLine);
        if (parsed.type === 'skip') {
            continue;
        }
        if (parsed.type === 'done') {
            yield { delta: '', done: true };
            return;
        }
        yield parsed.chunk;
        if (parsed.chunk.done) {
            return;
        }
    }
}
