import './extensions/EmployeeBuilderExtensions';

export { BaseBuilder } from './BaseBuilder';
export type { Buildable } from './BaseBuilder';
export { MarkupElement } from './MarkupElement';
export { MarkupBuilder } from './MarkupBuilder';
export { Person, PersonBuilder, PersonInfoBuilder, PersonJobBuilder, formatPerson } from './PersonBuilder';
export { VehicleBuilder, WHEEL_SIZE_RANGES, isWheelSizeAllowed, formatVehicle } from './VehicleBuilder';
export type { SpecifyingCategory, SpecifyingWheelSize, BuildableVehicle } from './VehicleBuilder';
export { FunctionalBuilder } from './FunctionalBuilder';
export type { BuildStep } from './FunctionalBuilder';
export { EmployeeBuilder, formatEmployee } from './EmployeeBuilder';
export { MemberBuilder, MemberAddressBuilder, MemberJobBuilder, formatMember } from './MemberBuilder';
