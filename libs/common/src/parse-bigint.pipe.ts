import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

/** Parses a non-negative decimal integer parameter into a bigint. */
@Injectable()
export class ParseBigIntPipe implements PipeTransform<string, bigint> {
  transform(value: string): bigint {
    if (!/^\d+$/.test(value)) {
      throw new BadRequestException(`"${value}" is not a non-negative integer`);
    }
    return BigInt(value);
  }
}
