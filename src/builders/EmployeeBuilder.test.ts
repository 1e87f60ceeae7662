import './extensions/EmployeeBuilderExtensions';
import { EmployeeBuilder, formatEmployee } from './EmployeeBuilder';
import { FunctionalBuilder } from './FunctionalBuilder';
import { Employee } from '../core/models';

describe('EmployeeBuilder', () => {
  it('should build an employee from named steps', () => {
    const employee = new EmployeeBuilder()
      .called('Sarah')
      .worksAs('Developer')
      .build();

    expect(employee).toEqual({ name: 'Sarah', position: 'Developer' });
  });

  it('should attach worksAs without touching the class', () => {
    expect(Object.prototype.hasOwnProperty.call(EmployeeBuilder.prototype, 'worksAs')).toBe(true);
    expect(new EmployeeBuilder().worksAs('Tester')).toBeInstanceOf(EmployeeBuilder);
  });

  it('should apply steps in insertion order so the last write wins', () => {
    const setName = (name: string) => (employee: Employee) => {
      employee.name = name;
    };

    const employee = new EmployeeBuilder().do(setName('A')).do(setName('B')).build();
    expect(employee.name).toBe('B');
  });

  it('should not depend on the order of steps for different fields', () => {
    const first = new EmployeeBuilder().called('Sarah').worksAs('Developer').build();
    const second = new EmployeeBuilder().worksAs('Developer').called('Sarah').build();

    expect(first).toEqual(second);
  });

  it('should defer steps until build', () => {
    const action = jest.fn();
    const builder = new EmployeeBuilder().do(action);

    expect(action).not.toHaveBeenCalled();
    builder.build();
    expect(action).toHaveBeenCalledTimes(1);
    expect(action).toHaveBeenCalledWith({ name: '', position: '' });
  });

  it('should start every build from a fresh employee', () => {
    const builder = new EmployeeBuilder().called('Sarah');
    const first = builder.build();
    const second = builder.build();

    expect(first).not.toBe(second);
    expect(first).toEqual(second);
  });

  it('should count accumulated steps', () => {
    const builder = new EmployeeBuilder();
    expect(builder.stepCount).toBe(0);

    builder.called('Sarah').worksAs('Developer').do(() => undefined);
    expect(builder.stepCount).toBe(3);
  });

  it('should format and serialize an employee', () => {
    const builder = new EmployeeBuilder().called('Sarah').worksAs('Developer');

    expect(formatEmployee(builder.build())).toBe('Name: Sarah, Position: Developer');
    expect(builder.buildAsYaml()).toBe('name: Sarah\nposition: Developer\n');
  });
});

describe('FunctionalBuilder', () => {
  interface Counter {
    count: number;
  }

  class CounterBuilder extends FunctionalBuilder<Counter> {
    constructor() {
      super(() => ({ count: 0 }));
    }

    increment(): this {
      return this.do(counter => {
        counter.count += 1;
      });
    }

    double(): this {
      return this.do(counter => {
        counter.count *= 2;
      });
    }
  }

  it('should fold steps left to right', () => {
    expect(new CounterBuilder().increment().double().build()).toEqual({ count: 2 });
    expect(new CounterBuilder().double().increment().build()).toEqual({ count: 1 });
  });

  it('should keep the subclass type through do', () => {
    const builder = new CounterBuilder().do(counter => {
      counter.count = 5;
    });

    expect(builder.increment().build()).toEqual({ count: 6 });
  });
});
