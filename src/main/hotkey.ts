import { GlobalKeyboardListener, IGlobalKeyEvent } from 'node-global-key-listener';
import { EventEmitter, on } from 'events';
import type { HotkeyEvent, HotkeyEventKind } from '../shared/types';
import { HotkeyUnavailableError, describeError } from '../shared/errors';

export interface HotkeyWatcherOptions {
  /** `+`-joined key names, e.g. `RIGHT CTRL` or `LEFT CTRL+SPACE`. */
  combo: string;
  cancelKey?: string;
}

export function parseCombo(binding: string): string[] {
  const keys = binding
    .split('+')
    .map((key) => key.trim().toUpperCase())
    .filter((key) => key.length > 0);
  return [...new Set(keys)];
}

function isHotkeyEvent(value: unknown): value is HotkeyEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'press' || value.kind === 'release' || value.kind === 'cancel')
  );
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Global push-to-talk key tracking. Emits one `press` when every key of the
 * combo is down and one `release` when any of them goes up; OS key repeat
 * while held is ignored.
 */
export class HotkeyWatcher extends EventEmitter {
  private keyListener: GlobalKeyboardListener | null = null;
  private combo: string[];
  private readonly cancelKey: string | undefined;
  private readonly heldKeys = new Set<string>();
  private comboDown = false;
  private observed = false;
  private readonly stopController = new AbortController();

  constructor(options: HotkeyWatcherOptions) {
    super();
    this.combo = parseCombo(options.combo);
    this.cancelKey = options.cancelKey ? options.cancelKey.trim().toUpperCase() || undefined : undefined;
    if (this.combo.length === 0) {
      throw new HotkeyUnavailableError(`Invalid hotkey binding: "${options.combo}"`);
    }
  }

  async start(): Promise<void> {
    if (this.keyListener) {
      return;
    }

    let listener: GlobalKeyboardListener | undefined;
    try {
      listener = new GlobalKeyboardListener();
      await listener.addListener((event: IGlobalKeyEvent) => {
        this.handleKeyEvent(event);
      });
    } catch (error) {
      listener?.kill();
      throw new HotkeyUnavailableError(
        `Could not install the global keyboard hook: ${describeError(error)}`,
        error
      );
    }

    this.keyListener = listener;
    console.log(`[Hotkey] Listener started (${this.describeCombo()})`);
  }

  stop(): void {
    this.stopController.abort();
    if (this.keyListener) {
      this.keyListener.kill();
      this.keyListener = null;
    }
    this.heldKeys.clear();
    this.comboDown = false;
    console.log('[Hotkey] Listener stopped');
  }

  /** Lazy, infinite sequence of edge events; ends on stop(). Can be taken once. */
  observe(): AsyncGenerator<HotkeyEvent> {
    if (this.observed) {
      throw new Error('Hotkey events can only be observed once');
    }
    this.observed = true;
    return this.iterate();
  }

  /** Rebinds the hotkey in place; a held old combo is released first. */
  setCombo(binding: string): void {
    const next = parseCombo(binding);
    if (next.length === 0) {
      console.warn(`[Hotkey] Ignoring invalid binding "${binding}"`);
      return;
    }
    if (this.comboDown) {
      this.comboDown = false;
      this.emitEdge('release');
    }
    this.combo = next;
    console.log(`[Hotkey] Rebound to ${this.describeCombo()}`);
  }

  describeCombo(): string {
    return this.combo.join('+');
  }

  private async *iterate(): AsyncGenerator<HotkeyEvent> {
    try {
      for await (const args of on(this, 'hotkey', { signal: this.stopController.signal })) {
        const event: unknown = args[0];
        if (isHotkeyEvent(event)) {
          yield event;
        }
      }
    } catch (error) {
      if (isAbortError(error)) {
        return;
      }
      throw error;
    }
  }

  private handleKeyEvent(event: Pick<IGlobalKeyEvent, 'name' | 'state'>): void {
    const name = event.name;
    if (!name) {
      return;
    }

    if (event.state === 'DOWN') {
      const repeat = this.heldKeys.has(name);
      this.heldKeys.add(name);

      if (!repeat && name === this.cancelKey) {
        this.emitEdge('cancel');
        return;
      }

      if (!this.comboDown && this.combo.every((key) => this.heldKeys.has(key))) {
        this.comboDown = true;
        this.emitEdge('press');
      }
    } else if (event.state === 'UP') {
      this.heldKeys.delete(name);

      if (this.comboDown && this.combo.includes(name)) {
        this.comboDown = false;
        this.emitEdge('release');
      }
    }
  }

  private emitEdge(kind: HotkeyEventKind): void {
    const event: HotkeyEvent = { kind, timestamp: Date.now() };
    this.emit('hotkey', event);
  }
}
