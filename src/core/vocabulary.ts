import { InvalidTermError } from "./errors";
import { multipleChoiceFromVocabulary, type GenerateOptions } from "./generator";
import type { Question } from "./question";
import type { TermSide } from "./types";
import type { RNG } from "./utils";

/** A front/back pair, e.g. a word and its definition. */
export class Term {
  constructor(
    readonly front: string,
    readonly back: string
  ) {
    Object.freeze(this);
  }

  at(i: 0 | 1): string {
    return i === 0 ? this.front : this.back;
  }

  side(side: TermSide): string {
    return side === "front" ? this.front : this.back;
  }

  toTuple(): [string, string] {
    return [this.front, this.back];
  }

  equals(other: Term): boolean {
    return this.front === other.front && this.back === other.back;
  }

  toString(): string {
    return `${this.front}: ${this.back}`;
  }
}

export class Vocabulary {
  readonly terms: readonly Term[];

  constructor(
    readonly name: string,
    terms: readonly unknown[]
  ) {
    terms.forEach((t, i) => {
      if (!(t instanceof Term)) throw new InvalidTermError(i);
    });
    this.terms = Object.freeze(terms.filter((t): t is Term => t instanceof Term));
  }

  static fromPairs(name: string, pairs: readonly (readonly [string, string])[]): Vocabulary {
    return new Vocabulary(
      name,
      pairs.map(([front, back]) => new Term(front, back))
    );
  }

  get size(): number {
    return this.terms.length;
  }

  multipleChoice(options: GenerateOptions = {}, rng?: RNG): Question {
    return multipleChoiceFromVocabulary(this, options, rng);
  }

  toString(): string {
    return this.terms.map(String).join("\n");
  }
}
