import 'reflect-metadata';
import { vi } from 'vitest';
import { Logger } from '@nestjs/common';

process.env.NODE_ENV = 'test';

// Use-case logging goes through Nest's Logger; keep test output clean.
Logger.overrideLogger(false);

vi.setConfig({ testTimeout: 10000 });
