import 'dotenv/config';
import { StartupConfigError } from './config/env.js';
import { startServer } from './server.js';

startServer().catch((err: unknown) => {
  if (err instanceof StartupConfigError) {
    // eslint-disable-next-line no-console
    console.error(`Cannot start: ${err.message}`);
  } else {
    // eslint-disable-next-line no-console
    console.error('Error starting the receptionist server:', err);
  }
  process.exit(1);
});
