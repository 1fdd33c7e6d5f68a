import { describe, it, expect } from '@jest/globals';
import {
  AuthorizationError,
  ContractError,
  HostError,
  I128_MAX,
  I128_MIN,
  ReentrancyError,
  isContractError,
  isI128,
} from '../../src/index';

describe('ContractError', () => {
  it('creates with all properties', () => {
    const err = new ContractError('admin already set', 'AlreadyExists', 'lock-release');
    expect(err.message).toBe('admin already set');
    expect(err.code).toBe('AlreadyExists');
    expect(err.contract).toBe('lock-release');
    expect(err.name).toBe('ContractError');
  });

  it('is instanceof Error', () => {
    const err = new ContractError('fail', 'NotFound', 'lock-release');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ContractError);
  });

  it('has a proper stack trace', () => {
    const err = new ContractError('fail', 'MissingValue', 'lock-release');
    expect(err.stack).toContain('ContractError');
  });
});

describe('AuthorizationError', () => {
  it('reports InvalidAction with the unauthorized address', () => {
    const err = new AuthorizationError('0xabc', 'fungible-token');
    expect(err.code).toBe('InvalidAction');
    expect(err.address).toBe('0xabc');
    expect(err.contract).toBe('fungible-token');
    expect(err.message).toBe('Missing authorization for 0xabc');
    expect(err.name).toBe('AuthorizationError');
    expect(err).toBeInstanceOf(ContractError);
  });
});

describe('ReentrancyError', () => {
  it('reports InvalidAction', () => {
    const err = new ReentrancyError('lock-release');
    expect(err.code).toBe('InvalidAction');
    expect(err.message).toBe('Reentrant call rejected');
    expect(err.name).toBe('ReentrancyError');
    expect(err).toBeInstanceOf(ContractError);
  });
});

describe('HostError', () => {
  it('is not a ContractError', () => {
    const err = new HostError('no contract', 'UnknownContract');
    expect(err.code).toBe('UnknownContract');
    expect(err.name).toBe('HostError');
    expect(err).toBeInstanceOf(Error);
    expect(isContractError(err)).toBe(false);
  });
});

describe('isContractError', () => {
  it('matches any code when none is given', () => {
    expect(isContractError(new ReentrancyError('c'))).toBe(true);
  });

  it('matches on code', () => {
    const err = new ContractError('paused', 'InvalidAction', 'c');
    expect(isContractError(err, 'InvalidAction')).toBe(true);
    expect(isContractError(err, 'NotFound')).toBe(false);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isContractError(new Error('x'))).toBe(false);
    expect(isContractError('InvalidAction')).toBe(false);
  });
});

describe('isI128', () => {
  it('accepts the bounds', () => {
    expect(isI128(I128_MAX)).toBe(true);
    expect(isI128(I128_MIN)).toBe(true);
    expect(isI128(0n)).toBe(true);
  });

  it('rejects values just outside', () => {
    expect(isI128(I128_MAX + 1n)).toBe(false);
    expect(isI128(I128_MIN - 1n)).toBe(false);
  });

  it('matches the 128-bit two\'s complement range', () => {
    expect(I128_MAX).toBe(170141183460469231731687303715884105727n);
    expect(I128_MIN).toBe(-170141183460469231731687303715884105728n);
  });
});
