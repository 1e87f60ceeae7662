import { BaseBuilder, Buildable } from './BaseBuilder';
import { InvalidArgumentError } from '../core/errors';
import { Vehicle, VehicleCategory, WheelSizeRange } from '../core/models';

export const WHEEL_SIZE_RANGES: Readonly<Record<VehicleCategory, WheelSizeRange>> = {
  [VehicleCategory.Sedan]: { min: 15, max: 17 },
  [VehicleCategory.Crossover]: { min: 17, max: 20 },
};

/**
 * Wheel sizes are whole numbers within the category's inclusive range
 */
export function isWheelSizeAllowed(category: VehicleCategory, size: number): boolean {
  const range = WHEEL_SIZE_RANGES[category];
  return Number.isInteger(size) && size >= range.min && size <= range.max;
}

/**
 * First stage: only the category can be chosen
 */
export interface SpecifyingCategory {
  ofType(category: VehicleCategory): SpecifyingWheelSize;
}

/**
 * Second stage: only the wheel size can be chosen
 */
export interface SpecifyingWheelSize {
  withWheels(size: number): BuildableVehicle;
}

/**
 * Final stage: the vehicle is complete
 */
export type BuildableVehicle = Buildable<Vehicle>;

/**
 * Backs every stage. Callers only ever see it through the stage
 * interface returned by the previous call.
 */
class StagedVehicleBuilder
  extends BaseBuilder<Vehicle>
  implements SpecifyingCategory, SpecifyingWheelSize, BuildableVehicle
{
  private readonly vehicle: Vehicle = {
    category: VehicleCategory.Sedan,
    wheelSize: 0,
  };

  ofType(category: VehicleCategory): SpecifyingWheelSize {
    this.vehicle.category = category;
    return this;
  }

  withWheels(size: number): BuildableVehicle {
    const { category } = this.vehicle;
    if (!isWheelSizeAllowed(category, size)) {
      throw new InvalidArgumentError('size', `Wrong size of wheel of ${category}.`);
    }

    this.vehicle.wheelSize = size;
    return this;
  }

  build(): Vehicle {
    return { ...this.vehicle };
  }
}

export const VehicleBuilder = {
  create(): SpecifyingCategory {
    return new StagedVehicleBuilder();
  },
};

export function formatVehicle(vehicle: Vehicle): string {
  return `Category: ${vehicle.category}, WheelSize: ${vehicle.wheelSize}`;
}
