import { VariableInfo } from './ast';
import { WordLangError, InternalError } from '../runtime/errors';

/**
 * Parse-time symbol table.
 *
 * Names live in a stack of frames; slots live in a flat list that only
 * grows. Popping a frame hides its names but keeps their slots, so every
 * VariableRef built during the parse stays valid at run time.
 */
export class ScopeResolver {
  private frames: Map<string, number>[] = [new Map()];
  private declared: VariableInfo[] = [];

  get depth(): number {
    return this.frames.length;
  }

  get variables(): VariableInfo[] {
    return this.declared;
  }

  declare(line: number, name: string): number {
    const frame = this.frames[this.frames.length - 1];
    if (frame.has(name)) {
      throw new WordLangError(`Redeclaration of variable '${name}'.`, line);
    }
    const slot = this.declared.length;
    this.declared.push({ name, line });
    frame.set(name, slot);
    return slot;
  }

  lookup(name: string): number | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const slot = this.frames[i].get(name);
      if (slot !== undefined) return slot;
    }
    return undefined;
  }

  pushScope(): void {
    this.frames.push(new Map());
  }

  popScope(): void {
    if (this.frames.length <= 1) {
      throw new InternalError('cannot pop the outermost scope');
    }
    this.frames.pop();
  }
}
