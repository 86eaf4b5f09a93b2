#!/usr/bin/env node
/**
 * main.ts
 *
 * Executable entry point. Loads .env before anything reads the
 * environment, then hands over to the CLI.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { run } from './cli';

process.exitCode = run(process.argv.slice(2));
