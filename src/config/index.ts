import dotenv from 'dotenv';
import { loadCorpusConfig, CorpusEnvConfig } from './corpus.config';

dotenv.config();

interface Config {
  nodeEnv: string;
  version: string;
  logLevel: string;
  corpus: CorpusEnvConfig;
}

export const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  corpus: loadCorpusConfig(),
};

export default config;
