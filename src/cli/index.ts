#!/usr/bin/env node

import { run } from 'cmd-ts';
import { createCopyCommand } from './commands/copy.js';
import { extractJsonFlag, normalizeArgAliases } from './json-output.js';
import { readPackageVersion } from './package-json.js';

const { args, json } = extractJsonFlag(normalizeArgAliases(process.argv.slice(2)));

const app = createCopyCommand({ json, version: readPackageVersion(import.meta.url) });

await run(app, args);
