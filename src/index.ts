#!/usr/bin/env node

import { flush, handle, run } from '@oclif/core';

run()
  .then(() => flush())
  .catch(handle);
