import { describe, it, expect } from '@jest/globals';
import { getAddress } from 'ethers';
import { I128_MAX } from '@bridge-escrow/types';
import {
  AddressSchema,
  AmountSchema,
  FeePercentageSchema,
  validateOrThrow,
  validateWithDetails,
} from '../../src';

const LOWERCASE_ADDRESS = `0x${'ab'.repeat(20)}`;

describe('AddressSchema', () => {
  it('checksums valid addresses', () => {
    expect(AddressSchema.parse(LOWERCASE_ADDRESS)).toBe(getAddress(LOWERCASE_ADDRESS));
  });

  it('rejects malformed addresses', () => {
    expect(AddressSchema.safeParse('0x123').success).toBe(false);
    expect(AddressSchema.safeParse('not-an-address').success).toBe(false);
  });
});

describe('FeePercentageSchema', () => {
  it('accepts numbers and bigints, returning bigint', () => {
    expect(FeePercentageSchema.parse(3)).toBe(3n);
    expect(FeePercentageSchema.parse(3n)).toBe(3n);
    expect(FeePercentageSchema.parse(0)).toBe(0n);
    expect(FeePercentageSchema.parse(100n)).toBe(100n);
  });

  it('rejects values outside 0-100', () => {
    expect(FeePercentageSchema.safeParse(101).success).toBe(false);
    expect(FeePercentageSchema.safeParse(-1n).success).toBe(false);
  });

  it('rejects fractional percentages', () => {
    expect(FeePercentageSchema.safeParse(2.5).success).toBe(false);
  });
});

describe('AmountSchema', () => {
  it('accepts 1 through the i128 maximum', () => {
    expect(AmountSchema.safeParse(1n).success).toBe(true);
    expect(AmountSchema.safeParse(I128_MAX).success).toBe(true);
  });

  it('rejects zero and overflow', () => {
    expect(AmountSchema.safeParse(0n).success).toBe(false);
    expect(AmountSchema.safeParse(I128_MAX + 1n).success).toBe(false);
  });
});

describe('validateWithDetails', () => {
  it('returns data on success', () => {
    expect(validateWithDetails(FeePercentageSchema, 7)).toEqual({ success: true, data: 7n });
  });

  it('returns path and message on failure', () => {
    expect(validateWithDetails(AddressSchema, 'nope')).toEqual({
      success: false,
      errors: [{ path: '', message: 'Invalid address format' }],
    });
  });
});

describe('validateOrThrow', () => {
  it('returns parsed data', () => {
    expect(validateOrThrow(FeePercentageSchema, 42, 'fee')).toBe(42n);
  });

  it('lists failures with context', () => {
    expect(() => validateOrThrow(FeePercentageSchema, 150, 'fee')).toThrow(
      'Config validation failed for fee:\n  - (root): Fee percentage cannot exceed 100'
    );
  });
});
