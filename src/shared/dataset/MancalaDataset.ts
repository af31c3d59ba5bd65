import type { DynGameState, MancalaBoardView } from '../engine/gameState';
import { EmptyDatasetError } from '../errors/GameDomainErrors';
import { MancalaExample, decodeExample, encodeExample } from './MancalaExample';

/**
 * Ordered collection of training examples. Every example is expected to use
 * the same pit count; {@link pits} reads it from the first one.
 */
export class MancalaDataset<S extends MancalaBoardView = MancalaBoardView> {
  readonly examples: ReadonlyArray<MancalaExample<S>>;

  constructor(examples: ReadonlyArray<MancalaExample<S>> = []) {
    this.examples = Object.freeze([...examples]);
  }

  static fromRecords(records: ReadonlyArray<ReadonlyArray<number>>): MancalaDataset<DynGameState> {
    return new MancalaDataset(records.map(decodeExample));
  }

  get size(): number {
    return this.examples.length;
  }

  /**
   * @throws EmptyDatasetError when the dataset has no examples.
   */
  pits(): number {
    if (this.examples.length === 0) {
      throw new EmptyDatasetError('determine the pit count');
    }
    return this.examples[0].state.pits;
  }

  /** Copy without repeated examples; the first occurrence is kept. */
  deduplicated(): MancalaDataset<S> {
    const seen = new Set<string>();
    const unique: MancalaExample<S>[] = [];
    for (const example of this.examples) {
      const key = example.key();
      if (!seen.has(key)) {
        seen.add(key);
        unique.push(example);
      }
    }
    return new MancalaDataset(unique);
  }

  concat(other: MancalaDataset<S>): MancalaDataset<S> {
    return new MancalaDataset([...this.examples, ...other.examples]);
  }

  toRecords(): number[][] {
    return this.examples.map(encodeExample);
  }
}
