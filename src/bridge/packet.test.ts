import { describe, it, expect } from 'vitest';
import { ProtocolError } from './errors.js';
import { parsePacket } from './packet.js';

describe('parsePacket', () => {
  it('normalizes a text packet', () => {
    expect(parsePacket({ id: 42, from: '!A1', to: '^all', text: 'hi' })).toEqual({
      kind: 'text',
      message: { id: '42', from: '!A1', to: '^all', text: 'hi', channel: 0 },
    });
  });

  it('accepts an explicit text port and channel', () => {
    const parsed = parsePacket({
      id: 'm1',
      from: '!A1',
      to: '!B2',
      text: 'hello',
      channel: 2,
      portnum: 'TEXT_MESSAGE_APP',
    });
    expect(parsed).toEqual({
      kind: 'text',
      message: { id: 'm1', from: '!A1', to: '!B2', text: 'hello', channel: 2 },
    });
  });

  it('ignores packets for other app ports', () => {
    expect(parsePacket({ id: 7, from: '!A1', to: '^all', text: '', portnum: 'POSITION_APP' })).toEqual({
      kind: 'ignored',
      portnum: 'POSITION_APP',
    });
  });

  it('rejects a packet without an id', () => {
    expect(() => parsePacket({ from: '!A1', to: '^all', text: 'hi' }, 'linkA')).toThrow(ProtocolError);
  });

  it('names the failing fields and the link', () => {
    try {
      parsePacket({ id: 'm1', from: '!A1', to: '^all', text: 5 }, 'linkB');
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      expect(err.link).toBe('linkB');
      expect(err.code).toBe('PROTOCOL_ERROR');
      expect(err.message).toContain('text:');
    }
  });

  it('rejects non-object packets', () => {
    expect(() => parsePacket('garbage')).toThrow(/Malformed packet: <root>/);
  });
});
