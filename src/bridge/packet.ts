/**
 * Inbound packet validation.
 *
 * Drivers hand the engine whatever their transport produced. Anything that
 * is not a well-formed text message is either ignored (other app ports)
 * or rejected with a ProtocolError.
 */

import { z } from 'zod';
import { ProtocolError } from './errors.js';
import type { LinkId, MeshMessage, RadioPacket } from './types.js';

export const TEXT_MESSAGE_PORT = 'TEXT_MESSAGE_APP';

const packetSchema = z.object({
  id: z.union([z.string().min(1), z.number().int().nonnegative()]),
  from: z.string().min(1),
  to: z.string().min(1),
  text: z.string(),
  channel: z.number().int().nonnegative().default(0),
  portnum: z.string().optional(),
});

export type ParsedPacket =
  | { kind: 'text'; message: MeshMessage }
  | { kind: 'ignored'; portnum: string };

/**
 * @throws ProtocolError when the packet is malformed
 */
export function parsePacket(packet: RadioPacket, link?: LinkId): ParsedPacket {
  const result = packetSchema.safeParse(packet);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError(`Malformed packet: ${issues}`, { link });
  }

  const { id, from, to, text, channel, portnum } = result.data;
  if (portnum !== undefined && portnum !== TEXT_MESSAGE_PORT) {
    return { kind: 'ignored', portnum };
  }

  return {
    kind: 'text',
    message: { id: String(id), from, to, text, channel },
  };
}
