import { createApp } from './app.js';
import { SessionStore } from './auth/sessions.js';
import { CommuteDataService } from './services/commuteData.js';
import { loadSettings, SettingsError, type ServerSettings } from './settings.js';

function describeTimeMode(settings: ServerSettings): string {
  const { timeMode } = settings.loadOptions;
  return timeMode.kind === 'zoned' ? `zoned (${timeMode.timeZone})` : 'naive';
}

function main(): void {
  const settings = loadSettings(process.env);
  const sessions = new SessionStore();
  const commuteData = new CommuteDataService({
    dataDir: settings.dataDir,
    configPath: settings.configPath,
    loadOptions: settings.loadOptions,
  });

  const app = createApp({ settings, sessions, commuteData });
  const server = app.listen(settings.port, settings.host, () => {
    console.info(`[main] Commute dashboard listening on http://${settings.host}:${settings.port}`);
    console.info(
      `[main] Data: ${settings.dataDir}, config: ${settings.configPath}, time mode: ${describeTimeMode(settings)}, ` +
        `password ${settings.password === undefined ? 'disabled' : 'enabled'}`,
    );
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    console.info(`[main] ${signal} received, shutting down`);
    server.close((error) => {
      if (error) {
        console.error('[main] Error closing server', error);
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  if (!(error instanceof SettingsError)) {
    throw error;
  }
  console.error(`[main] ${error.message}`);
  process.exitCode = 1;
}
