import 'reflect-metadata';
import { vi } from 'vitest';

// Mock environment variables
process.env.AWS_REGION = 'us-east-1';
process.env.NODE_ENV = 'test';
process.env.SQS_EXPORT_JOBS_URL = 'http://localhost:4566/000000000000/export-jobs';

// Increase timeout for async operations
vi.setConfig({ testTimeout: 10000 });
