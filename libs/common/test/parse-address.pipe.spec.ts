import { BadRequestException } from '@nestjs/common';

import { ParseAddressPipe } from '../src/parse-address.pipe';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';

describe('ParseAddressPipe', () => {
  const pipe = new ParseAddressPipe();

  it('checksums lowercase and uppercase input', () => {
    expect(pipe.transform(CHECKSUMMED.toLowerCase())).toBe(CHECKSUMMED);
    expect(pipe.transform(`0x${CHECKSUMMED.slice(2).toUpperCase()}`)).toBe(
      CHECKSUMMED,
    );
    expect(pipe.transform(CHECKSUMMED)).toBe(CHECKSUMMED);
  });

  it.each([
    'not-an-address',
    '0x1234',
    // valid hex, broken checksum
    '0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed',
  ])('rejects "%s"', (value) => {
    expect(() => pipe.transform(value)).toThrow(BadRequestException);
  });

  it('requires a value unless optional', () => {
    expect(() => pipe.transform(undefined)).toThrow('address is required');
    expect(new ParseAddressPipe({ optional: true }).transform(undefined)).toBe(
      undefined,
    );
    expect(new ParseAddressPipe({ optional: true }).transform('')).toBe(
      undefined,
    );
  });
});
