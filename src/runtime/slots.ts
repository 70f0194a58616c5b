import { WordSet, EMPTY_WORDS } from './words';
import { InternalError } from './errors';

/**
 * Runtime storage for variables, indexed by the slot numbers the parser
 * baked into VariableRef nodes. Slots are never freed.
 */
export class SlotTable {
  private values: WordSet[] = [];

  constructor(size = 0) {
    for (let i = 0; i < size; i++) this.allocate();
  }

  private allocate(): void {
    this.values.push(EMPTY_WORDS);
  }

  get(slot: number): WordSet {
    this.checkSlot(slot);
    return this.values[slot];
  }

  set(slot: number, words: WordSet): WordSet {
    this.checkSlot(slot);
    this.values[slot] = words;
    return words;
  }

  private checkSlot(slot: number): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.values.length) {
      throw new InternalError(`slot ${slot} is out of range (${this.values.length} allocated)`);
    }
  }
}
