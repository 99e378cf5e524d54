import { describe, it, expect } from 'vitest';
import {
  AuthError,
  ConfigError,
  InfrastructureError,
  WaitTimeoutError,
  isDisconnectError,
  isFatalError,
  toError,
} from '../errors';

describe('isFatalError', () => {
  it('should accept the run-ending error types', () => {
    expect(isFatalError(new WaitTimeoutError('home page', 20_000))).toBe(true);
    expect(isFatalError(new AuthError('no cookie'))).toBe(true);
    expect(isFatalError(new InfrastructureError('Browser session lost'))).toBe(true);
  });

  it('should reject configuration and plain errors', () => {
    expect(isFatalError(new ConfigError('bad flag'))).toBe(false);
    expect(isFatalError(new Error('click failed'))).toBe(false);
  });
});

describe('isDisconnectError', () => {
  it('should match closed page and browser messages', () => {
    expect(isDisconnectError(new Error('locator.click: Target page, context or browser has been closed'))).toBe(true);
    expect(isDisconnectError(new Error('Browser has been closed.'))).toBe(true);
  });

  it('should ignore ordinary interaction failures', () => {
    expect(isDisconnectError(new Error('locator.click: Timeout 2000ms exceeded.'))).toBe(false);
  });
});

describe('InfrastructureError', () => {
  it('should append the underlying message', () => {
    const error = new InfrastructureError('Could not launch the browser', new Error('spawn ENOENT'));

    expect(error.message).toBe('Could not launch the browser: spawn ENOENT');
    expect(error.name).toBe('InfrastructureError');
  });
});

describe('toError', () => {
  it('should wrap non-Error values', () => {
    expect(toError('boom').message).toBe('boom');
  });
});
