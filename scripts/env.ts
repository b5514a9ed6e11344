/**
 * Side-effect import: must come first in every script so modules that read
 * process.env at load time (the logger) see values from .env files.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
