import { describe, it, expect } from 'vitest';
import { ApiError, isUserAlreadyExistsError, isUserNotFoundError, TransportError } from './errors.js';

describe('isUserNotFoundError', () => {
  it.each([
    'User not found',
    'User does not exist: ada@example.edu.',
    'User ada@example.edu does not belong to this account',
    'User not found on this account: ada@example.edu.'
  ])('matches "%s"', (message) => {
    expect(isUserNotFoundError(new ApiError(message, 404))).toBe(true);
  });

  it('matches the user-does-not-exist code whatever the message', () => {
    expect(isUserNotFoundError(new ApiError('Unknown', 404, 1001))).toBe(true);
  });

  it('leaves other errors alone', () => {
    expect(isUserNotFoundError(new ApiError('Invalid access token.', 401, 124))).toBe(false);
    expect(isUserNotFoundError(new TransportError('User not found'))).toBe(false);
    expect(isUserNotFoundError(new Error('User not found'))).toBe(false);
  });
});

describe('isUserAlreadyExistsError', () => {
  it('matches the code or the message', () => {
    expect(isUserAlreadyExistsError(new ApiError('Conflict', 409, 1005))).toBe(true);
    expect(isUserAlreadyExistsError(new ApiError('User already in the account: ada@example.edu', 400))).toBe(true);
    expect(isUserAlreadyExistsError(new ApiError('Invalid email', 400, 300))).toBe(false);
  });
});

describe('error names', () => {
  it('reports the concrete class name', () => {
    expect(new ApiError('Bad', 400).name).toBe('ApiError');
    expect(new TransportError('Down').name).toBe('TransportError');
  });
});
