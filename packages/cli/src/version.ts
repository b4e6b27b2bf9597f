import { createRequire } from 'node:module';

// Read version from package.json to avoid hardcoding
const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

export const VERSION = pkg.version;
