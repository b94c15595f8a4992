import { enabledLogLevels, loadConfig } from './app.config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      logLevel: 'log',
      initialBalance: '100000',
      netWorthHistoryLimit: 50,
      transactionHistoryLimit: 50,
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      INITIAL_BALANCE: '2500.75',
      NET_WORTH_HISTORY_LIMIT: '10',
      TRANSACTION_HISTORY_LIMIT: '25',
    });

    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'production',
      logLevel: 'debug',
      initialBalance: '2500.75',
      netWorthHistoryLimit: 10,
      transactionHistoryLimit: 25,
    });
  });

  it('should list every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', INITIAL_BALANCE: '-5' })).toThrow(/PORT:[\s\S]*INITIAL_BALANCE:/);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid environment configuration');
  });

  it('should reject a zero history limit', () => {
    expect(() => loadConfig({ NET_WORTH_HISTORY_LIMIT: '0' })).toThrow(/NET_WORTH_HISTORY_LIMIT/);
  });
});

describe('enabledLogLevels', () => {
  it('should enable the threshold and everything more severe', () => {
    expect(enabledLogLevels('warn')).toEqual(['error', 'warn']);
    expect(enabledLogLevels('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });
});
