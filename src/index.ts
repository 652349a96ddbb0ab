import config from './config/config';
import { Supervisor } from './supervisor';
import { formatError } from './utils/errors';
import { LOG, setLogLevel } from './utils/logger';

setLogLevel(config.logLevel);

let exiting = false;

const exit = async (code: number): Promise<void> => {
  if (exiting) return;
  exiting = true;
  try {
    await supervisor.shutdown();
  } catch (error) {
    LOG.error(`Error during shutdown: ${formatError(error)}`);
    code = code || 1;
  } finally {
    process.exit(code);
  }
};

const supervisor = new Supervisor({
  config,
  onFatal: (error) => {
    LOG.error(`Fatal: ${error.message}`);
    void exit(1);
  },
});

process.on('SIGINT', () => {
  LOG.info('Received SIGINT');
  void exit(0);
});

process.on('SIGTERM', () => {
  LOG.info('Received SIGTERM');
  void exit(0);
});

supervisor.start().catch((error: unknown) => {
  LOG.error(`Startup failed: ${formatError(error)}`);
  void exit(1);
});
