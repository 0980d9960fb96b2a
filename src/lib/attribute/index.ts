/**
 * Attribute: one column's values plus its learned statistical pattern.
 *
 * An attribute lives in one of two modes. Built from raw values it computes
 * its pattern once and keeps the values resident, so it can re-derive its
 * distribution and pseudonymize them. Built from a pattern record it has no
 * values and supports everything that needs only the pattern: encoding,
 * indexing and sampling.
 */

import {
  AttributePattern,
  AttributeType,
  OneHotTable,
  PatternState,
  RawValue,
  Scalar,
} from "../../types/attribute.js";
import { normalizeColumn } from "../inferencer/index.js";
import {
  DEFAULT_BIN_SIZE,
  buildDistribution,
  profileColumn,
  resolveDomain,
} from "../profiler/index.js";
import {
  binIndexes as indexKeys,
  encode as encodeKeys,
  recount,
  toKey,
} from "../encoder/index.js";
import {
  choiceValues,
  pseudonymizeValues,
  randomValues,
} from "../synthesizer/index.js";
import { parsePattern } from "../pattern/index.js";
import { InvalidOperationError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface AttributeOptions {
  /** Force categorical treatment regardless of type or uniqueness */
  categorical?: boolean;
  /** Histogram bin count for non-categorical attributes */
  binSize?: number;
}

export class Attribute {
  readonly name: string;
  readonly binSize: number;

  private readonly raw: readonly RawValue[] | undefined;
  private values: Scalar[] = [];
  private keys: Scalar[] = [];

  private state = PatternState.Unset;
  private _type: AttributeType | undefined;
  private _categorical = false;
  private _min = 0;
  private _max = 0;
  private _decimals: number | null = null;
  private _bins: Scalar[] = [];
  private _prs: number[] = [];
  private _counts: number[] = [];

  /**
   * @param values - Raw column; omit to build the attribute from a pattern
   *   later via {@link Attribute.setPattern}
   */
  constructor(
    name: string,
    values?: readonly RawValue[],
    options: AttributeOptions = {},
  ) {
    const binSize = options.binSize ?? DEFAULT_BIN_SIZE;
    if (!Number.isInteger(binSize) || binSize < 1) {
      throw new ValidationError(`Bin size must be a positive integer, got ${binSize}`);
    }

    this.name = name;
    this.binSize = binSize;
    this.raw = values === undefined ? undefined : [...values];

    if (this.raw !== undefined) {
      this.setPattern(undefined, { categorical: options.categorical });
    }
  }

  /**
   * Rebuild an attribute from a serialized pattern, without raw values
   */
  static fromPattern(pattern: AttributePattern): Attribute {
    const attribute = new Attribute(pattern.name);
    attribute.setPattern(pattern);
    return attribute;
  }

  /**
   * Compute the pattern from the resident values, or install a supplied one.
   * Only the first call has an effect.
   */
  setPattern(
    pattern?: AttributePattern,
    options: { categorical?: boolean } = {},
  ): void {
    if (this.state === PatternState.Computed) {
      logger.debug("Pattern already set, ignoring", { name: this.name });
      return;
    }

    if (pattern === undefined) {
      this.computePattern(options.categorical ?? false);
    } else {
      this.installPattern(parsePattern(pattern));
    }

    this.state = PatternState.Computed;
  }

  private computePattern(categorical: boolean): void {
    if (this.raw === undefined) {
      throw new InvalidOperationError(
        "Attribute has no values to compute a pattern from",
        { name: this.name },
      );
    }

    const column = normalizeColumn(this.raw, { categorical });
    const profile = profileColumn(column, this.binSize);

    this.values = column.values;
    this.keys = column.keys;
    this._type = column.type;
    this._categorical = column.categorical;
    this._min = profile.range.min;
    this._max = profile.range.max;
    this._decimals = profile.decimals;
    this._bins = profile.distribution.bins;
    this._counts = profile.distribution.counts;
    this._prs = profile.distribution.prs;

    logger.debug("Attribute pattern computed", {
      name: this.name,
      type: this._type,
      categorical: this._categorical,
      bins: this._bins.length,
    });
  }

  private installPattern(pattern: AttributePattern): void {
    this._type = pattern.type;
    this._categorical = pattern.categorical;
    this._min = pattern.min;
    this._max = pattern.max;
    this._decimals = pattern.type === "float" ? pattern.decimals : null;
    this._bins = [...pattern.bins];
    this._prs = [...pattern.prs];
    this._counts = pattern.prs.map(() => 0);
  }

  get patternState(): PatternState {
    return this.state;
  }

  get hasRawData(): boolean {
    return this.raw !== undefined;
  }

  get type(): AttributeType {
    if (this._type === undefined) {
      throw new InvalidOperationError("Attribute has no pattern yet", { name: this.name });
    }
    return this._type;
  }

  get categorical(): boolean {
    return this._categorical;
  }

  get isNumerical(): boolean {
    return this.type === "integer" || this.type === "float";
  }

  get min(): number {
    return this._min;
  }

  get max(): number {
    return this._max;
  }

  get decimals(): number | null {
    return this._decimals;
  }

  get bins(): Scalar[] {
    return [...this._bins];
  }

  get prs(): number[] {
    return [...this._prs];
  }

  /**
   * Number of resident values; 0 for an attribute built from a pattern
   */
  get size(): number {
    return this.values.length;
  }

  /**
   * Imputed values in display form (datetime as M/D/YYYY)
   */
  getValues(): Scalar[] {
    return [...this.values];
  }

  /**
   * Category list for categorical attributes, [min, max] otherwise
   */
  get domain(): Scalar[] {
    return this._categorical ? [...this._bins] : [this._min, this._max];
  }

  /**
   * Install a domain and re-derive the distribution from the resident values.
   * Datetime entries may be date strings.
   */
  set domain(domain: Scalar[]) {
    const keys = this.requireRawData("set a domain");
    const type = this.type;
    const override = resolveDomain(type, this._categorical, domain);
    const distribution = buildDistribution({
      type,
      categorical: override.categorical,
      keys,
      range: override.range,
      binSize: this.binSize,
      declaredBins: override.declaredBins,
    });

    this._categorical = override.categorical;
    this._min = override.range.min;
    this._max = override.range.max;
    this._bins = distribution.bins;
    this._counts = distribution.counts;
    this._prs = distribution.prs;

    logger.debug("Attribute domain overridden", {
      name: this.name,
      categorical: this._categorical,
      min: this._min,
      max: this._max,
      bins: this._bins.length,
    });
  }

  /**
   * Stored per-bin counts, or counts of the resident values against other
   * bins (percentages when normalize is set)
   */
  counts(bins?: readonly Scalar[], normalize = true): number[] {
    if (bins === undefined) {
      return [...this._counts];
    }
    const keys = this.requireRawData("re-count values");
    return recount(this.toPattern(), keys, bins, normalize);
  }

  /**
   * Bin position of each value; defaults to the resident values
   */
  binIndexes(values?: readonly RawValue[]): number[] {
    return indexKeys(this.toPattern(), this.keysFor(values));
  }

  /**
   * One-hot table (categorical) or normalized codes (numeric, datetime)
   */
  encode(values?: readonly RawValue[]): OneHotTable | number[] {
    return encodeKeys(this.toPattern(), this.keysFor(values));
  }

  toPattern(): AttributePattern {
    const type = this.type;
    return {
      name: this.name,
      type,
      categorical: this._categorical,
      min: this._min,
      max: this._max,
      decimals: type === "float" ? this._decimals : null,
      bins: [...this._bins],
      prs: [...this._prs],
    };
  }

  /**
   * Domain-uniform values ignoring the learned probabilities
   */
  random(size: number = this.size): Scalar[] {
    return randomValues(this.toPattern(), size);
  }

  /**
   * Values drawn by the learned probabilities, or from supplied bin indexes
   */
  choice(size: number = this.size, indexes?: readonly number[]): Scalar[] {
    return choiceValues(this.toPattern(), { size, indexes });
  }

  /**
   * One-way masked values; resampled first when size differs from the data
   */
  pseudonymize(size: number = this.size): string[] {
    return pseudonymizeValues(this.toPattern(), this.values, size);
  }

  private keysFor(values: readonly RawValue[] | undefined): (Scalar | undefined)[] {
    if (values === undefined) {
      return [...this.keys];
    }
    const pattern = { type: this.type };
    return values.map((value) => toKey(pattern, value));
  }

  private requireRawData(operation: string): Scalar[] {
    if (this.raw === undefined) {
      throw new InvalidOperationError(
        `Cannot ${operation} without raw values`,
        { name: this.name, operation },
      );
    }
    return this.keys;
  }
}
