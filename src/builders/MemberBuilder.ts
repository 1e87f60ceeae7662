import { BaseBuilder } from './BaseBuilder';
import { InvalidArgumentError } from '../core/errors';
import { Member } from '../core/models';

function createMember(): Member {
  return {
    streetAddress: '',
    postcode: '',
    city: '',
    companyName: '',
    position: '',
    annualIncome: 0,
  };
}

/**
 * Root of the faceted member builder. The root and every facade it hands
 * out write to the same Member instance.
 */
export class MemberBuilder extends BaseBuilder<Member> {
  constructor(protected readonly member: Member = createMember()) {
    super();
  }

  get address(): MemberAddressBuilder {
    return new MemberAddressBuilder(this.member);
  }

  get works(): MemberJobBuilder {
    return new MemberJobBuilder(this.member);
  }

  /**
   * The shared member itself, not a copy
   */
  build(): Member {
    return this.member;
  }
}

export class MemberAddressBuilder extends MemberBuilder {
  at(streetAddress: string): this {
    this.member.streetAddress = streetAddress;
    return this;
  }

  withPostcode(postcode: string): this {
    this.member.postcode = postcode;
    return this;
  }

  in(city: string): this {
    this.member.city = city;
    return this;
  }
}

export class MemberJobBuilder extends MemberBuilder {
  at(companyName: string): this {
    this.member.companyName = companyName;
    return this;
  }

  asA(position: string): this {
    this.member.position = position;
    return this;
  }

  /**
   * Set the annual income, a whole number
   */
  earning(amount: number): this {
    if (!Number.isInteger(amount)) {
      throw new InvalidArgumentError('amount', `Annual income must be a whole number, got ${amount}`);
    }
    this.member.annualIncome = amount;
    return this;
  }
}

export function formatMember(member: Member): string {
  return [
    `StreetAddress: ${member.streetAddress}`,
    `Postcode: ${member.postcode}`,
    `City: ${member.city}`,
    `CompanyName: ${member.companyName}`,
    `Position: ${member.position}`,
    `AnnualIncome: ${member.annualIncome}`,
  ].join(', ');
}
