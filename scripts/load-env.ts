/**
 * Load .env.local (and .env) before anything reads process.env.
 * Import this first in scripts: import './load-env'
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
