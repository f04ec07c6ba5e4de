export type PathBuilderOptions = {
  /** Decimal places kept per coordinate. */
  precision?: number;
};

/**
 * Fluent builder for SVG path `d` strings.
 *
 *   new PathBuilder().moveTo(0, 0).lineTo(4, 0).lineTo(4, 4).close().build();
 *   // "M 0 0 L 4 0 L 4 4 Z"
 */
export class PathBuilder {
  private readonly commands: string[] = [];
  private readonly precision: number;

  constructor(options: PathBuilderOptions = {}) {
    this.precision = options.precision ?? 6;
  }

  moveTo(x: number, y: number): this {
    this.commands.push(`M ${this.num(x)} ${this.num(y)}`);
    return this;
  }

  lineTo(x: number, y: number): this {
    this.commands.push(`L ${this.num(x)} ${this.num(y)}`);
    return this;
  }

  arcTo(rx: number, ry: number, rotation: number, largeArc: boolean, sweep: boolean, x: number, y: number): this {
    this.commands.push(
      `A ${this.num(rx)} ${this.num(ry)} ${this.num(rotation)} ${largeArc ? 1 : 0} ${sweep ? 1 : 0} ${this.num(x)} ${this.num(y)}`
    );
    return this;
  }

  close(): this {
    this.commands.push("Z");
    return this;
  }

  build(): string {
    return this.commands.join(" ");
  }

  // Rounds away float noise such as 6.123e-17; `+ 0` turns -0 into 0.
  private num(value: number): string {
    return String(Number(value.toFixed(this.precision)) + 0);
  }
}
