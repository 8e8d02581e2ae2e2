import { BadRequestException } from '@nestjs/common';

import { ParseBigIntPipe } from '../src/parse-bigint.pipe';

describe('ParseBigIntPipe', () => {
  const pipe = new ParseBigIntPipe();

  it('parses decimal integers beyond the safe range', () => {
    expect(pipe.transform('0')).toBe(0n);
    expect(pipe.transform('123456789012345678901234567890')).toBe(
      123456789012345678901234567890n,
    );
  });

  it.each(['', '-1', '1.5', '0x10', 'abc'])('rejects "%s"', (value) => {
    expect(() => pipe.transform(value)).toThrow(BadRequestException);
  });
});
