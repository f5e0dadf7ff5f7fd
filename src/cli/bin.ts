#!/usr/bin/env node
import { program } from './index.js';

program.parse(process.argv);
