/**
 * Core value types shared by the builders
 */

/**
 * Plain representation of a markup tree node
 */
export interface MarkupNode {
  name: string;
  text: string;
  children: MarkupNode[];
}

export enum VehicleCategory {
  Sedan = 'Sedan',
  Crossover = 'Crossover',
}

export interface Vehicle {
  category: VehicleCategory;
  wheelSize: number;
}

/**
 * Inclusive wheel size bounds
 */
export interface WheelSizeRange {
  min: number;
  max: number;
}

export interface Employee {
  name: string;
  position: string;
}

export interface Member {
  // address
  streetAddress: string;
  postcode: string;
  city: string;

  // job
  companyName: string;
  position: string;
  annualIncome: number;
}
