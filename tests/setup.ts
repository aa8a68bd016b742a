import { vi, afterEach } from 'vitest';

process.env.NODE_ENV = 'test';
delete process.env.CONFIG_FILE;
delete process.env.LOG_LEVEL;

// Mock pino logger to prevent output during tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => ({
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
    })),
  }),
}));

// Reset mocks after each test
afterEach(() => {
  vi.clearAllMocks();
});
