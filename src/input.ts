// Raw terminal input decoding and the key queue the frame loop polls

import { getLogger } from './logging.ts';
import type { NavigationEvent } from './navigation.ts';

const logger = getLogger('Input');

export interface RawKeyInput {
  sequence: string;
  name: string;
  ctrl?: boolean;
  alt?: boolean;
}

// Arrow keys in normal (CSI) and application (SS3) cursor mode
const ESCAPE_MAP: Record<string, string> = {
  '\x1b[A': 'up',
  '\x1b[B': 'down',
  '\x1b[C': 'right',
  '\x1b[D': 'left',
  '\x1bOA': 'up',
  '\x1bOB': 'down',
  '\x1bOC': 'right',
  '\x1bOD': 'left',
  '\x1b[H': 'home',
  '\x1b[F': 'end',
  '\x1b[3~': 'delete',
  '\x1b[5~': 'pageup',
  '\x1b[6~': 'pagedown',
  '\x1b\x08': 'backspace',
  '\x1b\x7f': 'backspace',
};

const CONTROL_KEYS: Record<number, string> = {
  8: 'backspace',
  9: 'tab',
  10: 'enter',
  13: 'enter',
  27: 'escape',
};

const KEY_EVENTS = new Map<string, NavigationEvent>([
  ['up', { type: 'up' }],
  ['down', { type: 'down' }],
  ['left', { type: 'left' }],
  ['right', { type: 'right' }],
  ['enter', { type: 'enter' }],
  ['backspace', { type: 'backspace' }],
  ['escape', { type: 'escape' }],
  ['c', { type: 'clear-cache' }],
  ['q', { type: 'quit' }],
]);

/**
 * Check if character terminates a CSI sequence
 */
function isCSITerminator(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x40 && code <= 0x7E;
}

/**
 * Length of the escape sequence starting at `start`. Terminal replies
 * (APC, OSC, DCS strings) run to ST or BEL and are kept whole so a late
 * capability reply is dropped as one unit.
 */
function escapeSequenceLength(text: string, start: number): number {
  let end = start + 1;
  if (end >= text.length) {
    return 1;
  }

  const introducer = text[end];
  if (introducer === '[') {
    end++;
    while (end < text.length && !isCSITerminator(text[end])) {
      end++;
    }
    return Math.min(end + 1, text.length) - start;
  }

  if (introducer === '_' || introducer === ']' || introducer === 'P') {
    end++;
    while (end < text.length) {
      if (text[end] === '\x07') {
        return end + 1 - start;
      }
      if (text[end] === '\x1b' && text[end + 1] === '\\') {
        return end + 2 - start;
      }
      end++;
    }
    return end - start;
  }

  // SS3 (ESC O x) or Alt+char
  if (introducer === 'O' && end + 1 < text.length) {
    return 3;
  }
  return 2;
}

/**
 * Split raw input text into key sequences
 */
export function parseInputSequences(text: string): string[] {
  const sequences: string[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] === '\x1b') {
      const length = escapeSequenceLength(text, i);
      sequences.push(text.slice(i, i + length));
      i += length;
    } else {
      // One code point, so non-BMP characters are not split
      const codePoint = text.codePointAt(i) ?? 0;
      const char = String.fromCodePoint(codePoint);
      sequences.push(char);
      i += char.length;
    }
  }
  return sequences;
}

export function parseKeySequence(sequence: string): RawKeyInput | null {
  if (sequence.length === 1) {
    const code = sequence.charCodeAt(0);
    if (code === 127) {
      // DEL (backspace on most Unix terminals)
      return { sequence, name: 'backspace' };
    }
    if (code < 32) {
      const standalone = CONTROL_KEYS[code];
      if (standalone) {
        return { sequence, name: standalone };
      }
      return { sequence, name: String.fromCharCode(code + 96), ctrl: true };
    }
    return { sequence, name: sequence };
  }

  if (sequence.startsWith('\x1b')) {
    const mapped = ESCAPE_MAP[sequence];
    if (mapped) {
      return { sequence, name: mapped };
    }

    // Modified arrows (\x1b[1;5C etc.) navigate like plain arrows
    const modified = sequence.match(/^\x1b\[1;\d+([ABCD])$/);
    if (modified) {
      return { sequence, name: ESCAPE_MAP[`\x1b[${modified[1]}`] };
    }

    if (sequence.length === 2 && sequence[1] >= ' ') {
      return { sequence, name: sequence[1], alt: true };
    }
    // Unknown sequence or terminal reply
    return null;
  }

  return { sequence, name: sequence };
}

/**
 * Map a decoded key to a navigation event; null for keys the viewer ignores.
 */
export function toNavigationEvent(key: RawKeyInput): NavigationEvent | null {
  if (key.ctrl) {
    return key.name === 'c' ? { type: 'quit' } : null;
  }
  if (key.alt) {
    return null;
  }

  const event = KEY_EVENTS.get(key.name);
  if (event) {
    return event;
  }
  if (/^[0-9]$/.test(key.name)) {
    return { type: 'digit', digit: key.name };
  }
  return null;
}

/**
 * Decode a raw input chunk to navigation events, in order
 */
export function decodeInput(text: string): NavigationEvent[] {
  const events: NavigationEvent[] = [];
  for (const sequence of parseInputSequences(text)) {
    const key = parseKeySequence(sequence);
    const event = key ? toNavigationEvent(key) : null;
    if (event) {
      events.push(event);
    } else {
      logger.trace('Ignored input', { sequence: sequence.replace(/\x1b/g, 'ESC') });
    }
  }
  return events;
}

export type InputSource = (handler: (data: Uint8Array) => void) => () => void;

/**
 * Buffers decoded key events between loop iterations. The loop pulls at
 * most one event per iteration with poll().
 */
export class InputQueue {
  private readonly _events: NavigationEvent[] = [];
  private readonly _decoder = new TextDecoder();
  private _waiter: (() => void) | null = null;
  private _unsubscribe: (() => void) | null = null;

  constructor(private readonly _source?: InputSource) {}

  start(): void {
    if (this._unsubscribe || !this._source) {
      return;
    }
    this._unsubscribe = this._source(data => this.push(data));
  }

  stop(): void {
    this._unsubscribe?.();
    this._unsubscribe = null;
    this._wake();
  }

  push(data: Uint8Array): void {
    const events = decodeInput(this._decoder.decode(data, { stream: true }));
    if (events.length === 0) {
      return;
    }
    this._events.push(...events);
    this._wake();
  }

  /**
   * Inject an event directly (signals map to quit this way)
   */
  pushEvent(event: NavigationEvent): void {
    this._events.push(event);
    this._wake();
  }

  get pending(): number {
    return this._events.length;
  }

  /**
   * Next event, waiting up to `timeoutMs` for one; null on timeout.
   */
  async poll(timeoutMs: number): Promise<NavigationEvent | null> {
    const queued = this._events.shift();
    if (queued) {
      return queued;
    }

    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        this._waiter = null;
        resolve();
      }, timeoutMs);
      this._waiter = () => {
        clearTimeout(timer);
        this._waiter = null;
        resolve();
      };
    });

    return this._events.shift() ?? null;
  }

  private _wake(): void {
    this._waiter?.();
  }
}
