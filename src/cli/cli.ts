#!/usr/bin/env node
import { main } from '../index.js';

main(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error) => {
    console.error('Unhandled error:', error);
    process.exitCode = 1;
  });
