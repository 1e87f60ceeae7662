/**
 * Job vocabulary for EmployeeBuilder, attached from outside the class.
 *
 * The augmentation types `worksAs` on every EmployeeBuilder, but the method
 * only exists once this module has been loaded. The builders barrel and the
 * package entry point load it; code importing '../EmployeeBuilder' directly
 * must import this module for its side effect as well.
 */

import { EmployeeBuilder } from '../EmployeeBuilder';

declare module '../EmployeeBuilder' {
  interface EmployeeBuilder {
    worksAs(position: string): this;
  }
}

EmployeeBuilder.prototype.worksAs = function worksAs(this: EmployeeBuilder, position: string) {
  return this.do(employee => {
    employee.position = position;
  });
};
