// src/utils/validation.ts
import { Rgb } from '../types/transcript.types';

export class Validators {
  // RGB(<int>,<int>,<int>), spaces allowed around the components
  private static readonly rgbPattern = /^RGB\(\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*\)$/i;
  private static readonly hexPattern = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

  /**
   * Validate RGB(r,g,b) color spec with each component in 0..255
   */
  static isValidRgbSpec(spec: string): boolean {
    const match = this.rgbPattern.exec(spec);
    if (!match) return false;
    return [match[1], match[2], match[3]].every(component => this.isColorComponent(Number(component)));
  }

  /**
   * Validate #rrggbb color spec
   */
  static isValidHexSpec(spec: string): boolean {
    return this.hexPattern.test(spec);
  }

  static isColorComponent(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= 255;
  }

  /**
   * Explain why a color spec is rejected, or null when it is acceptable
   */
  static colorSpecProblem(spec: string): string | null {
    const rgbMatch = this.rgbPattern.exec(spec);
    if (rgbMatch) {
      const components = [rgbMatch[1], rgbMatch[2], rgbMatch[3]].map(Number);
      if (components.every(component => this.isColorComponent(component))) {
        return null;
      }
      return `valid RGB ints are between 0 and 255; was given ${components.join(', ')}`;
    }
    if (this.hexPattern.test(spec)) {
      return null;
    }
    if (spec.startsWith('#')) {
      return `'${spec}' is not of form '#rrggbb' of hex numbers`;
    }
    return `color must be RGB(<int>,<int>,<int>) or #rrggbb; not '${spec}'`;
  }

  static parseColorSpec(spec: string): Rgb | null {
    if (this.colorSpecProblem(spec) !== null) {
      return null;
    }

    const rgbMatch = this.rgbPattern.exec(spec);
    if (rgbMatch) {
      return { red: Number(rgbMatch[1]), green: Number(rgbMatch[2]), blue: Number(rgbMatch[3]) };
    }

    const hexMatch = this.hexPattern.exec(spec);
    if (hexMatch) {
      return {
        red: parseInt(hexMatch[1], 16),
        green: parseInt(hexMatch[2], 16),
        blue: parseInt(hexMatch[3], 16)
      };
    }
    return null;
  }

  /**
   * Normalized key for a color: #RRGGBB, upper case
   */
  static toHex(rgb: Rgb): string {
    const hex = (component: number) => component.toString(16).padStart(2, '0').toUpperCase();
    return `#${hex(rgb.red)}${hex(rgb.green)}${hex(rgb.blue)}`;
  }

  static formatRgb(rgb: Rgb): string {
    return `RGB(${rgb.red},${rgb.green},${rgb.blue})`;
  }
}
