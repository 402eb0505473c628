import { clipboard, keyboard, Key } from '@nut-tree-fork/nut-js';
import type { DeliveryResult, InsertionMode, OutputInjector } from '../shared/types';
import { describeError } from '../shared/errors';

// Small delay to let focus return to the target application
const INSERTION_DELAY_MS = 100;

// Long enough for the target application to read the clipboard
const CLIPBOARD_RESTORE_DELAY_MS = 150;

export interface InsertionSettings {
  insertionMode: InsertionMode;
  restoreClipboard: boolean;
}

export interface TextInserterOptions {
  settings: () => InsertionSettings;
  platform?: NodeJS.Platform;
  insertionDelayMs?: number;
  restoreDelayMs?: number;
}

export class TextInserter implements OutputInjector {
  constructor(private readonly options: TextInserterOptions) {}

  async deliver(text: string, cancel: AbortSignal): Promise<DeliveryResult> {
    if (!text || text.trim().length === 0) {
      console.log('[Insert] No text to insert');
      return { ok: true };
    }

    // Wait for focus to return
    await delay(this.options.insertionDelayMs ?? INSERTION_DELAY_MS);

    // A newer press may have superseded this run during the wait
    if (cancel.aborted) {
      console.log('[Insert] Run cancelled before insertion');
      return { ok: false, kind: 'Cancelled', message: 'Cancelled' };
    }

    const { insertionMode, restoreClipboard } = this.options.settings();

    try {
      if (insertionMode === 'paste') {
        await this.insertViaPaste(text, restoreClipboard);
      } else {
        await insertViaType(text);
      }
      console.log(`[Insert] Text inserted via ${insertionMode} mode`);
      return { ok: true };
    } catch (error) {
      console.error('[Insert] Text insertion failed:', describeError(error));
      const kept = await leaveOnClipboard(text);
      return {
        ok: false,
        kind: 'InjectionFailed',
        message: kept
          ? `Insertion failed (${describeError(error)}). Text left on the clipboard.`
          : `Insertion failed (${describeError(error)}).`,
      };
    }
  }

  private async insertViaPaste(text: string, restore: boolean): Promise<void> {
    const previousContent = restore ? await readClipboard() : undefined;

    await clipboard.setContent(text);

    const modifier = (this.options.platform ?? process.platform) === 'darwin' ? Key.LeftSuper : Key.LeftControl;
    await keyboard.pressKey(modifier, Key.V);
    await keyboard.releaseKey(Key.V, modifier);

    if (previousContent === undefined) {
      return;
    }

    await delay(this.options.restoreDelayMs ?? CLIPBOARD_RESTORE_DELAY_MS);
    try {
      await clipboard.setContent(previousContent);
    } catch (error) {
      console.warn('[Insert] Could not restore previous clipboard:', describeError(error));
    }
  }
}

async function insertViaType(text: string): Promise<void> {
  // Slower than pasting but works where paste is blocked
  await keyboard.type(text);
}

async function readClipboard(): Promise<string | undefined> {
  try {
    return await clipboard.getContent();
  } catch (error) {
    console.warn('[Insert] Could not read clipboard, it will not be restored:', describeError(error));
    return undefined;
  }
}

async function leaveOnClipboard(text: string): Promise<boolean> {
  try {
    await clipboard.setContent(text);
    return true;
  } catch (error) {
    console.error('[Insert] Could not write text to the clipboard:', describeError(error));
    return false;
  }
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
