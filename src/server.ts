import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { loadCompanies, companyIndex } from './registry';
import { openDatabase } from './db';
import { createApp } from './app';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('Jobs');

const config = loadConfig();
setLogLevel(config.logLevel);
openDatabase(config.databasePath);

const app = createApp(companyIndex(loadCompanies(config.companiesFile)));

app.listen(config.port, () => {
  log.info(`Server running on http://localhost:${config.port}`);
});
