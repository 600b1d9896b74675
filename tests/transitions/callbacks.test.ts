/**
 * Tests for the callback registry.
 */

import { describe, it, expect } from 'vitest';
import { TransitionCallbacks } from '../../src/transitions/callbacks.js';

describe('TransitionCallbacks', () => {
  it('should look up actions by transition and state', () => {
    const outgoing = () => true;
    const incoming = () => false;
    const callbacks = new TransitionCallbacks()
      .registerOutgoing('open', outgoing)
      .registerIncoming('open', 'inbox', incoming);

    expect(callbacks.outgoing('open')).toBe(outgoing);
    expect(callbacks.outgoing('close')).toBeUndefined();
    expect(callbacks.incoming('open', 'inbox')).toBe(incoming);
    expect(callbacks.incoming('open', 'home')).toBeUndefined();
  });

  it('should replace an earlier registration', () => {
    const first = () => true;
    const second = () => false;
    const callbacks = new TransitionCallbacks()
      .registerIncoming('open', 'inbox', first)
      .registerIncoming('open', 'inbox', second);

    expect(callbacks.incoming('open', 'inbox')).toBe(second);
  });

  it('should forget everything on clear', () => {
    const callbacks = new TransitionCallbacks().registerOutgoing('open', () => true);
    callbacks.clear();
    expect(callbacks.outgoing('open')).toBeUndefined();
  });
});
