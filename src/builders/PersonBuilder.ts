import { BaseBuilder } from './BaseBuilder';

export class Person {
  name = '';
  position = '';

  /**
   * A fresh builder for a new person
   */
  static get New(): PersonJobBuilder {
    return new PersonJobBuilder();
  }

  toString(): string {
    return formatPerson(this);
  }
}

/**
 * Owns the person under construction
 */
export abstract class PersonBuilder extends BaseBuilder<Person> {
  protected person = new Person();

  build(): Person {
    return this.person;
  }
}

/**
 * Personal details stage
 */
export class PersonInfoBuilder extends PersonBuilder {
  /**
   * Set the person's name
   */
  called(name: string): this {
    this.person.name = name;
    return this;
  }
}

/**
 * Job details stage. Methods inherited from earlier stages still return
 * this builder type, so calls from both stages chain in any order.
 */
export class PersonJobBuilder extends PersonInfoBuilder {
  /**
   * Set the person's position
   */
  worksAsA(position: string): this {
    this.person.position = position;
    return this;
  }
}

export function formatPerson(person: Person): string {
  return `Name: ${person.name}, Position: ${person.position}`;
}
