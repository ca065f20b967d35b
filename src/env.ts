/**
 * Load .env BEFORE any other module initializes (the logger reads LOG_LEVEL,
 * the BLE layer reads NOBLE_DRIVER at import time).
 * This must be the first import in index.ts.
 *
 * A .env in the working directory wins over the one next to the install.
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __dirname: string = dirname(fileURLToPath(import.meta.url));
config({ path: [join(process.cwd(), '.env'), join(__dirname, '..', '.env')] });
