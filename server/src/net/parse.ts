import { z } from 'zod';
import { MessageType } from 'shared';
import type { ClientMessage } from 'shared';

const Vector2Schema = z.object({
    x: z.number().finite(),
    y: z.number().finite()
});

const ClientMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal(MessageType.JOIN),
        name: z.string()
    }),
    z.object({
        type: z.literal(MessageType.MOVE),
        position: Vector2Schema
    })
]);

export type ParseResult =
    | { ok: true; message: ClientMessage }
    | { ok: false; error: string };

export function parseClientMessage(text: string): ParseResult {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        return { ok: false, error: e instanceof Error ? e.message : 'Invalid JSON' };
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: parsed.error.issues.map(i => i.message).join('; ') };
    }
    return { ok: true, message: parsed.data };
}
