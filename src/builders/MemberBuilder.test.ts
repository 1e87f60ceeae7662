import { InvalidArgumentError } from '../core/errors';
import { MemberBuilder, MemberAddressBuilder, MemberJobBuilder, formatMember } from './MemberBuilder';
import { Member } from '../core/models';

describe('MemberBuilder', () => {
  it('should collect address and job details through facades', () => {
    const builder = new MemberBuilder();
    builder
      .address.at('12 Harbour Street')
        .in('Leeds')
        .withPostcode('LS1 4AB')
      .works.at('Northwind')
        .asA('Analyst')
        .earning(54000);

    expect(builder.build()).toEqual({
      streetAddress: '12 Harbour Street',
      postcode: 'LS1 4AB',
      city: 'Leeds',
      companyName: 'Northwind',
      position: 'Analyst',
      annualIncome: 54000,
    });
  });

  it('should share one member between the root and every facade', () => {
    const root = new MemberBuilder();
    const address = root.address;
    const job = root.works;

    address.in('York');
    job.asA('Clerk');

    expect(address.build()).toBe(root.build());
    expect(job.build()).toBe(root.build());
    expect(job.build().city).toBe('York');
    expect(address.build().position).toBe('Clerk');
  });

  it('should accumulate interleaved facade calls', () => {
    const root = new MemberBuilder();
    root.works.at('Acme').address.in('Leeds').works.earning(100).address.at('1 Main Road');

    expect(root.build()).toMatchObject({
      companyName: 'Acme',
      city: 'Leeds',
      annualIncome: 100,
      streetAddress: '1 Main Road',
    });
  });

  it('should return the facade itself from each call', () => {
    const root = new MemberBuilder();
    const address = root.address;
    const job = root.works;

    expect(address).toBeInstanceOf(MemberAddressBuilder);
    expect(address.at('x').withPostcode('y')).toBe(address);
    expect(job).toBeInstanceOf(MemberJobBuilder);
    expect(job.at('x').asA('y').earning(1)).toBe(job);
  });

  it('should write to a member passed in by the caller', () => {
    const member: Member = {
      streetAddress: '',
      postcode: '',
      city: 'Hull',
      companyName: '',
      position: '',
      annualIncome: 0,
    };

    new MemberBuilder(member).works.earning(30000);

    expect(member.annualIncome).toBe(30000);
    expect(member.city).toBe('Hull');
  });

  it('should reject an income that is not a whole number', () => {
    const root = new MemberBuilder();

    expect(() => root.works.earning(1.5)).toThrow(InvalidArgumentError);
    expect(() => root.works.earning(1.5)).toThrow('Annual income must be a whole number, got 1.5');
    expect(root.build().annualIncome).toBe(0);
  });

  it('should format a member', () => {
    const builder = new MemberBuilder();
    builder.address.at('12 Harbour Street').in('Leeds').withPostcode('LS1 4AB');
    builder.works.at('Northwind').asA('Analyst').earning(54000);

    expect(formatMember(builder.build())).toBe(
      'StreetAddress: 12 Harbour Street, Postcode: LS1 4AB, City: Leeds, ' +
        'CompanyName: Northwind, Position: Analyst, AnnualIncome: 54000',
    );
  });

  it('should serialize the shared member from any facade', () => {
    const root = new MemberBuilder();
    const job = root.works.at('Acme');

    expect(JSON.parse(job.buildAsJson())).toEqual(JSON.parse(root.buildAsJson()));
  });
});
