import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { getStore } from './store/index.js';

dotenv.config();

const config = loadConfig();
const store = getStore();
const app = createApp(store);

export { app };

if (config.nodeEnv !== 'test') {
  app.listen(config.port, () => console.log(`Courtside listening on :${config.port}`));
}
