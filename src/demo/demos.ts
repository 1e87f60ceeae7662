/**
 * One sample construction per builder in the catalogue
 */

import '../builders/extensions/EmployeeBuilderExtensions';
import { Buildable } from '../builders/BaseBuilder';
import { MarkupBuilder } from '../builders/MarkupBuilder';
import { Person, formatPerson } from '../builders/PersonBuilder';
import { VehicleBuilder, formatVehicle } from '../builders/VehicleBuilder';
import { EmployeeBuilder, formatEmployee } from '../builders/EmployeeBuilder';
import { MemberBuilder, formatMember } from '../builders/MemberBuilder';
import { VehicleCategory } from '../core/models';
import { DemoName } from '../config/DemoConfig';

export interface DemoResult {
  name: DemoName;
  title: string;
  /** Human-readable rendering of the built value */
  text: string;
  builder: Buildable<unknown>;
}

export type Demo = () => DemoResult;

export function runMarkupDemo(): DemoResult {
  const builder = MarkupBuilder.create('ul')
    .addChild('li', 'hello')
    .addChild('li', 'world');

  return { name: 'markup', title: 'Fluent Builder', text: builder.render(), builder };
}

export function runPersonDemo(): DemoResult {
  const builder = Person.New
    .called('Ada')
    .worksAsA('engineer');

  return {
    name: 'person',
    title: 'Recursive Generic Builder',
    text: formatPerson(builder.build()),
    builder,
  };
}

export function runVehicleDemo(): DemoResult {
  const builder = VehicleBuilder.create()
    .ofType(VehicleCategory.Crossover)
    .withWheels(18);

  return {
    name: 'vehicle',
    title: 'Stepwise Builder',
    text: formatVehicle(builder.build()),
    builder,
  };
}

export function runEmployeeDemo(): DemoResult {
  const builder = new EmployeeBuilder()
    .called('Sarah')
    .worksAs('Developer');

  return {
    name: 'employee',
    title: 'Functional Builder',
    text: formatEmployee(builder.build()),
    builder,
  };
}

export function runMemberDemo(): DemoResult {
  const builder = new MemberBuilder();
  builder
    .address.at('12 Harbour Street')
      .in('Leeds')
      .withPostcode('LS1 4AB')
    .works.at('Northwind')
      .asA('Analyst')
      .earning(54000);

  return {
    name: 'member',
    title: 'Faceted Builder',
    text: formatMember(builder.build()),
    builder,
  };
}

export const DEMOS: Readonly<Record<DemoName, Demo>> = {
  markup: runMarkupDemo,
  person: runPersonDemo,
  vehicle: runVehicleDemo,
  employee: runEmployeeDemo,
  member: runMemberDemo,
};
