#!/usr/bin/env -S npx tsx

import { config } from 'dotenv'
import { logger } from '@nipvm/core'
import { createProgram } from './program'

// Load environment variables
config()

// Initialize logger
logger.init()

createProgram().parse(process.argv)
