import { AppError } from '../../../shared/errors/app-error.js';

import { formatKeyValue, type KeyValue } from '../value-objects/key-value.js';
import { formatNumber, type Value } from '../value-objects/value.js';

export const SUPPORTED_VERSION = 4.0;

export interface HeaderProps {
  readonly version: number;
  readonly width: number;
  readonly height: number;
  readonly unknown?: ReadonlyMap<string, Value>;
}

export class Header {
  public readonly version: number;

  public readonly width: number;

  public readonly height: number;

  /** Properties the parser does not model, keyed by name. Absent when there were none. */
  public readonly unknown?: ReadonlyMap<string, Value>;

  private constructor(props: HeaderProps) {
    this.version = props.version;
    this.width = props.width;
    this.height = props.height;
    this.unknown = props.unknown;
  }

  public static create(props: HeaderProps): Header {
    if (props.version !== SUPPORTED_VERSION) {
      throw AppError.invalidMetadata(
        'validation',
        `Version ${formatNumber(props.version)} not supported, only ${formatNumber(SUPPORTED_VERSION)}`,
        { version: props.version },
      );
    }

    if (!isDimension(props.width) || !isDimension(props.height)) {
      throw AppError.invalidMetadata('validation', 'Header dimensions must be non-negative integers', {
        width: props.width,
        height: props.height,
      });
    }

    return new Header(props);
  }

  /**
   * Folds the indented properties that follow a `version = ...` line.
   * Later properties overwrite earlier ones with the same key.
   */
  public static fromProperties(version: number, properties: readonly KeyValue[]): Header {
    let width: number | undefined;
    let height: number | undefined;
    let unknown: Map<string, Value> | undefined;

    for (const property of properties) {
      switch (property.key) {
        case 'width':
          width = property.value;
          break;
        case 'height':
          height = property.value;
          break;
        case 'unknown':
          unknown ??= new Map();
          unknown.set(property.name, property.value);
          break;
        default:
          throw AppError.invalidMetadata(
            'validation',
            `\`${formatKeyValue(property)}\` not allowed in the header`,
            { key: property.key },
          );
      }
    }

    if (width === undefined) {
      throw missingField('width');
    }

    if (height === undefined) {
      throw missingField('height');
    }

    return Header.create({ version, width, height, unknown });
  }
}

function isDimension(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function missingField(field: string): AppError {
  return AppError.invalidMetadata('validation', `Required field \`${field}\` was not found`, {
    field,
  });
}
