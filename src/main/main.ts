import { ConfigStore, describeConfig, loadCredentials, resolveConfigDir } from '../shared/config';
import { describeError } from '../shared/errors';
import { createSystemCapture } from './audioCapture';
import { DeepgramTranscriber } from './deepgram';
import { HotkeyWatcher } from './hotkey';
import { LlmPostProcessor } from './llm';
import { PipelineController } from './pipeline';
import { StatusIndicator } from './statusIndicator';
import { TextInserter } from './textInsertion';

async function main(): Promise<void> {
  console.log('=== holdtalk starting ===');

  const configStore = new ConfigStore({ cwd: resolveConfigDir(), watch: true });

  if (process.argv.includes('--reset-config')) {
    configStore.reset();
    console.log(`Settings cleared (${configStore.path})`);
    return;
  }

  const credentials = loadCredentials();
  const config = configStore.getAll();
  console.log(`[Config] Loaded ${configStore.path}:`, describeConfig(config, credentials));

  if (!credentials.deepgramApiKey) {
    console.warn('[Config] DEEPGRAM_API_KEY is not set; transcription will fail with AuthError');
  }

  console.log('Probing microphone recorder...');
  const capture = await createSystemCapture();

  const transcriber = new DeepgramTranscriber({
    apiKey: credentials.deepgramApiKey,
    settings: () => {
      const { deepgramModel, transcriptionTimeoutMs } = configStore.getAll();
      return { model: deepgramModel, timeoutMs: transcriptionTimeoutMs };
    },
  });

  const postProcessor = new LlmPostProcessor({
    apiKey: credentials.openaiApiKey,
    settings: () => {
      const { llmModel, postProcessTimeoutMs } = configStore.getAll();
      return { model: llmModel, timeoutMs: postProcessTimeoutMs };
    },
  });

  const injector = new TextInserter({ settings: () => configStore.getAll() });

  const watcher = new HotkeyWatcher({ combo: config.hotkey, cancelKey: config.cancelKey });

  const indicator = new StatusIndicator({ hotkeyLabel: watcher.describeCombo(), level: capture });

  const controller = new PipelineController({
    capture,
    transcriber,
    postProcessor,
    injector,
    feedback: indicator,
    settings: () => configStore.getAll(),
  });

  const unsubscribeHotkey = configStore.onChange('hotkey', (binding) => {
    watcher.setCombo(binding);
  });

  console.log('Setting up hotkey listener...');
  await watcher.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}, shutting down`);
    controller.cancel();
    watcher.stop();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  indicator.showIdle();
  console.log('=== holdtalk started successfully ===');

  for await (const event of watcher.observe()) {
    controller.handle(event);
  }

  await controller.drain();
  unsubscribeHotkey();
  indicator.destroy();
  console.log('=== holdtalk stopped ===');
}

main()
  .then(() => {
    // The config file watcher keeps the event loop alive
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('Fatal:', describeError(error));
    process.exit(1);
  });
