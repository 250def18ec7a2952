import dotenv from 'dotenv';
import { createApp } from './app.js';
import { resolveServerConfig } from './config.js';

dotenv.config();

const config = resolveServerConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Simulation server listening on http://localhost:${config.port}`);
  console.log(
    `[config] logLevel=${config.logLevel} prometheus=${config.prometheus.enabled ? config.prometheus.mode : 'disabled'}`
  );
});
