#!/usr/bin/env node
import { program } from './cli/index.js';

program.parse(process.argv);
