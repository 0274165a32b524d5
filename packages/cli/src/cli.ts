#!/usr/bin/env node
import { config } from 'dotenv'
import { createProgram } from './program'

config({ path: ['.env.local', '.env'] })

await createProgram().parseAsync()
