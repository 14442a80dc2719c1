#!/usr/bin/env node
import dotenv from 'dotenv';
import { runConvert } from '../cli/convert.js';

dotenv.config();

process.exitCode = runConvert(process.argv.slice(2));
