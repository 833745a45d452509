import dotenv from 'dotenv';

// Imported first by index.ts, before config/env.ts parses process.env.
// Variables already present in the environment win over the file.
const envFile = process.env.DOTENV_PATH || '.env';
const result = dotenv.config({ path: envFile });

if (result.error && 'code' in result.error && result.error.code !== 'ENOENT') {
  // The logger reads LOG_LEVEL, which may live in the file we failed to read.
  console.warn(`[env] could not read ${envFile}: ${result.error.message}`);
}
