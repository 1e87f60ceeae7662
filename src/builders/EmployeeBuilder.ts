import { FunctionalBuilder } from './FunctionalBuilder';
import { Employee } from '../core/models';

export class EmployeeBuilder extends FunctionalBuilder<Employee> {
  constructor() {
    super(() => ({ name: '', position: '' }));
  }

  called(name: string): this {
    return this.do(employee => {
      employee.name = name;
    });
  }
}

export function formatEmployee(employee: Employee): string {
  return `Name: ${employee.name}, Position: ${employee.position}`;
}
