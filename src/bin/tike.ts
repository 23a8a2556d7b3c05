#!/usr/bin/env -S npx tsx
import { runTike } from './run';

process.exit(runTike(process.argv.slice(1)));
