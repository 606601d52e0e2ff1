#!/usr/bin/env node
import { repl } from './repl.js'

process.exitCode = await repl({
  input: process.stdin,
  output: process.stdout
})
