import { getAddress, isAddress } from '@ethersproject/address';
import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

import { Address } from '@Bazaar/type';

export type ParseAddressPipeOptions = {
  // Lets an absent or empty value through as undefined.
  optional?: boolean;
};

/**
 * Checks an address parameter and returns it checksummed, the form the
 * marketplace stores and compares addresses in.
 */
@Injectable()
export class ParseAddressPipe
  implements PipeTransform<string | undefined, Address | undefined>
{
  constructor(private readonly options: ParseAddressPipeOptions = {}) {}

  transform(value: string | undefined): Address | undefined {
    if (value === undefined || value === '') {
      if (this.options.optional) {
        return undefined;
      }
      throw new BadRequestException('address is required');
    }
    if (!isAddress(value)) {
      throw new BadRequestException(`"${value}" is not an address`);
    }
    return getAddress(value);
  }
}
