import { ConnectionConfig } from '../../interfaces';

export const testConfig = (
  overrides: Partial<ConnectionConfig> = {}
): ConnectionConfig => ({
  host: 'remote.test',
  port: 22,
  username: 'tester',
  password: 'test-secret',
  tmuxSession: 'remote',
  venvName: 'ml_env',
  readyTimeout: 10000,
  ...overrides,
});
