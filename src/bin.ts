#!/usr/bin/env node
import { startCLI } from './cli';

startCLI(process.argv[2]);
