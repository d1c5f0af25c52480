import { vi } from 'vitest';

// The logger writes straight to the console; keep test output readable.
vi.spyOn(console, 'log').mockImplementation(() => undefined);
vi.spyOn(console, 'error').mockImplementation(() => undefined);
