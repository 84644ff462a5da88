import type { Header } from './header.js';
import type { State } from './state.js';

export class Metadata {
  public readonly header: Header;

  public readonly states: readonly State[];

  private constructor(header: Header, states: readonly State[]) {
    this.header = header;
    this.states = Object.freeze([...states]);
  }

  public static create(header: Header, states: readonly State[]): Metadata {
    return new Metadata(header, states);
  }

  /** First state with the given name. Names may repeat; see {@link statesNamed}. */
  public findState(name: string): State | undefined {
    return this.states.find((state) => state.name === name);
  }

  public statesNamed(name: string): State[] {
    return this.states.filter((state) => state.name === name);
  }
}
