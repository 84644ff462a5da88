import { AppError } from '../../../shared/errors/app-error.js';

import type { DirectionCount } from '../value-objects/direction-count.js';
import { formatKeyValue, type KeyValue } from '../value-objects/key-value.js';
import type { Value } from '../value-objects/value.js';

export type Hotspot = readonly [x: number, y: number, layer: number];

export interface StateProps {
  readonly name: string;
  readonly dirs: DirectionCount;
  readonly frames: number;
  readonly delays?: readonly number[];
  readonly loopFlag?: number;
  readonly rewind?: number;
  readonly movement?: number;
  readonly hotspot?: Hotspot;
  readonly unknown?: ReadonlyMap<string, Value>;
}

/**
 * One named animation sequence of the sprite sheet.
 */
export class State {
  public readonly name: string;

  public readonly dirs: DirectionCount;

  public readonly frames: number;

  /** Per-frame delays in ticks. Not checked against `frames`. */
  public readonly delays?: readonly number[];

  public readonly loopFlag?: number;

  public readonly rewind?: number;

  public readonly movement?: number;

  public readonly hotspot?: Hotspot;

  public readonly unknown?: ReadonlyMap<string, Value>;

  private constructor(props: StateProps) {
    this.name = props.name;
    this.dirs = props.dirs;
    this.frames = props.frames;
    this.delays = props.delays === undefined ? undefined : Object.freeze([...props.delays]);
    this.loopFlag = props.loopFlag;
    this.rewind = props.rewind;
    this.movement = props.movement;
    this.hotspot = props.hotspot;
    this.unknown = props.unknown;
  }

  public static fromProperties(name: string, properties: readonly KeyValue[]): State {
    let dirs: DirectionCount | undefined;
    let frames = 1;
    let delays: readonly number[] | undefined;
    let loopFlag: number | undefined;
    let rewind: number | undefined;
    let movement: number | undefined;
    let hotspot: Hotspot | undefined;
    let unknown: Map<string, Value> | undefined;

    for (const property of properties) {
      switch (property.key) {
        case 'dirs':
          dirs = property.value;
          break;
        case 'frames':
          frames = property.value;
          break;
        case 'delay':
          delays = property.value;
          break;
        case 'loop':
          loopFlag = property.value;
          break;
        case 'rewind':
          rewind = property.value;
          break;
        case 'movement':
          movement = property.value;
          break;
        case 'hotspot':
          hotspot = toHotspot(property.value);
          break;
        case 'unknown':
          unknown ??= new Map();
          unknown.set(property.name, property.value);
          break;
        default:
          throw AppError.invalidMetadata(
            'validation',
            `\`${formatKeyValue(property)}\` not allowed in a state`,
            { key: property.key },
          );
      }
    }

    if (dirs === undefined) {
      throw AppError.invalidMetadata('validation', 'Required field `dirs` was not found', {
        field: 'dirs',
      });
    }

    return new State({ name, dirs, frames, delays, loopFlag, rewind, movement, hotspot, unknown });
  }

  /** Number of icon cells the state occupies in the sprite sheet. */
  public get iconCount(): number {
    return this.dirs * this.frames;
  }
}

function toHotspot(values: readonly number[]): Hotspot {
  if (values.length !== 3) {
    throw AppError.invalidMetadata(
      'validation',
      `Hotspot information was not length 3 (got ${values.length})`,
      { length: values.length },
    );
  }

  return [values[0], values[1], values[2]];
}
