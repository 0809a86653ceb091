// Set test environment before any module reads it
process.env.NODE_ENV = 'test';

// Load test-specific environment variables
import { config } from 'dotenv';
config({ path: '.env.test' });

process.env.JWT_SECRET = process.env.JWT_SECRET || 'test-secret';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
