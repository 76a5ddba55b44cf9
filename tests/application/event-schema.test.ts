import { describe, it, expect } from 'vitest';
import { classifyWireMessage, isJsonObject } from '../../src/application/event-schema.js';

describe('classifyWireMessage', () => {
  it('recognises a CloudEvents notification', () => {
    const message = classifyWireMessage({
      id: 'e-1',
      type: '*',
      time: '2026-03-01T12:00:00.000Z',
      data: { event_type: 'kv-v2/data-delete', event: { id: 'e-1', metadata: { path: 'secret/data/a' } } },
    });

    expect(message).toEqual({
      kind: 'vault',
      event_type: 'kv-v2/data-delete',
      id: 'e-1',
      time: '2026-03-01T12:00:00.000Z',
      data: { event_type: 'kv-v2/data-delete', event: { id: 'e-1', metadata: { path: 'secret/data/a' } } },
    });
  });

  it('recognises a generic typed message', () => {
    expect(classifyWireMessage({ type: 'x', data: { k: 1 } })).toEqual({
      kind: 'typed',
      event_type: 'x',
      id: undefined,
      time: undefined,
      data: { k: 1 },
    });
  });

  it('falls back to typed when data.event_type is not a string', () => {
    const message = classifyWireMessage({ type: 'x', data: { event_type: 5 } });
    expect(message.kind).toBe('typed');
  });

  it('ignores an empty type string', () => {
    expect(classifyWireMessage({ type: '' }).kind).toBe('unknown');
  });

  it('classifies scalars and arrays as unknown', () => {
    expect(classifyWireMessage('text')).toEqual({ kind: 'unknown', raw: 'text' });
    expect(classifyWireMessage([1])).toEqual({ kind: 'unknown', raw: [1] });
    expect(classifyWireMessage(null)).toEqual({ kind: 'unknown', raw: null });
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject(undefined)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});
