import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();

createApp(config).listen(config.port, () => {
  console.log(`Image analysis API listening on http://localhost:${config.port} (${config.llm.provider})`);
});
