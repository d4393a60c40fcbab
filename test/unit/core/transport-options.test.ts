/**
 * Unit tests for how UndiciTransport builds its dispatcher
 */

import { Agent, ProxyAgent } from 'undici';
import { UndiciTransport } from '../../../src/core/transport';
import { createLogger } from '../../../src/lib/logger';

// Mock the undici dispatchers so no sockets are opened
jest.mock('undici', () => ({
  Agent: jest.fn().mockImplementation(() => ({
    close: jest.fn().mockResolvedValue(undefined),
  })),
  ProxyAgent: jest.fn().mockImplementation(() => ({
    close: jest.fn().mockResolvedValue(undefined),
  })),
  fetch: jest.fn(),
}));

const MockedAgent = jest.mocked(Agent);
const MockedProxyAgent = jest.mocked(ProxyAgent);

describe('UndiciTransport dispatcher options', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should verify certificates by default', () => {
    new UndiciTransport();

    expect(MockedAgent).toHaveBeenCalledWith({ connections: undefined, connect: { rejectUnauthorized: true } });
    expect(MockedProxyAgent).not.toHaveBeenCalled();
  });

  it('should disable certificate verification and warn when verifySsl is false', () => {
    const logger = createLogger('transport');
    const warn = jest.spyOn(logger, 'warn').mockImplementation();

    new UndiciTransport({ verifySsl: false, connections: 4, logger });

    expect(MockedAgent).toHaveBeenCalledWith({ connections: 4, connect: { rejectUnauthorized: false } });
    expect(warn).toHaveBeenCalledWith('TLS certificate verification is disabled');
  });

  it('should not warn when certificates are verified', () => {
    const logger = createLogger('transport');
    const warn = jest.spyOn(logger, 'warn').mockImplementation();

    new UndiciTransport({ verifySsl: true, logger });

    expect(warn).not.toHaveBeenCalled();
  });

  it('should route through a ProxyAgent when a proxy is configured', () => {
    const logger = createLogger('transport');
    const debug = jest.spyOn(logger, 'debug').mockImplementation();

    new UndiciTransport({ proxy: 'http://proxy.example.test:8080', logger });

    expect(MockedProxyAgent).toHaveBeenCalledWith({
      uri: 'http://proxy.example.test:8080',
      connections: undefined,
      requestTls: { rejectUnauthorized: true },
    });
    expect(MockedAgent).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledWith('Using proxy: http://proxy.example.test:8080');
  });

  it('should pass verifySsl false on to the proxied TLS connection', () => {
    new UndiciTransport({ proxy: 'http://proxy.example.test:8080', verifySsl: false });

    expect(MockedProxyAgent).toHaveBeenCalledWith({
      uri: 'http://proxy.example.test:8080',
      connections: undefined,
      requestTls: { rejectUnauthorized: false },
    });
  });

  it('should close the dispatcher it created', async () => {
    const transport = new UndiciTransport({ verifySsl: false });
    const agent = MockedAgent.mock.results[0]?.value;

    await transport.close();

    expect(agent?.close).toHaveBeenCalledTimes(1);
  });

  it('should close the proxy dispatcher it created', async () => {
    const transport = new UndiciTransport({ proxy: 'http://proxy.example.test:8080' });
    const proxyAgent = MockedProxyAgent.mock.results[0]?.value;

    await transport.close();

    expect(proxyAgent?.close).toHaveBeenCalledTimes(1);
  });
});
