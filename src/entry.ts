#!/usr/bin/env node
import process from 'node:process';
import { main } from './cli/run.js';

process.title = 'powermodes';

await main(process.argv.slice(2));
