#!/usr/bin/env node
import dotenv from 'dotenv';
import { runMakeManifest } from '../cli/make-manifest.js';

dotenv.config();

process.exitCode = runMakeManifest(process.argv.slice(2));
