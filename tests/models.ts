import { field, serializable, Types } from '../src/index.js';

export enum Colour {
  Red = 'RED',
  Green = 'GREEN',
  Blue = 'BLUE',
}

export const ColourType = Types.enumOf(Colour, 'Colour');

export class Custom {
  @field(ColourType) colour: Colour | null = null;
  @field(Date) date: Date | null = null;
  @field(Types.boolean) flag = false;
  @field(Types.string) name: string | null = null;
  @field(Types.double) age = 0;

  static of(values: Partial<Custom>): Custom {
    return Object.assign(new Custom(), values);
  }
}

@serializable({ final: true })
export class ListNode {
  @field(Types.string) label = '';
  @field(Types.lazy(() => ListNode)) next: ListNode | null = null;

  /** Chain of `depth` links after the head. */
  static chain(depth: number): ListNode {
    const head = new ListNode();
    head.label = 'n0';
    let tail = head;
    for (let i = 1; i <= depth; i++) {
      const node = new ListNode();
      node.label = `n${i}`;
      tail.next = node;
      tail = node;
    }
    return head;
  }
}

export class TreeNode {
  @field(Types.string) name = '';
  @field(Types.array(Types.lazy(() => TreeNode))) children: TreeNode[] = [];
}

export class Animal {
  @field(Types.string) name = '';
}

@serializable({ name: 'test.Dog' })
export class Dog extends Animal {
  @field(Types.boolean) goodBoy = true;
}

@serializable()
export class Cat extends Animal {
  @field(Types.int) lives = 9;
}

export class Zoo {
  @field(Animal) star: Animal | null = null;
  @field(Types.array(Animal)) residents: Animal[] = [];
}

export class Labelled {
  @field(Types.string) #tag = 'base';

  get baseTag(): string {
    return this.#tag;
  }

  set baseTag(value: string) {
    this.#tag = value;
  }
}

export class MoreLabelled extends Labelled {
  @field(Types.string) #tag = 'derived';

  get derivedTag(): string {
    return this.#tag;
  }

  set derivedTag(value: string) {
    this.#tag = value;
  }
}

export class Person {
  @field(Types.string) name: string;
  @field(Types.int) age: number;

  constructor(name: string, age: number) {
    this.name = name;
    this.age = age;
  }
}

export class Money {
  @field(Types.string) currency: string;
  @field(Types.long) cents: bigint;

  constructor(currency: string, cents: bigint) {
    this.currency = currency;
    this.cents = cents;
  }
}

export abstract class Shape {
  abstract area(): number;
}

export class Circle extends Shape {
  @field(Types.double) radius = 1;

  area(): number {
    return Math.PI * this.radius * this.radius;
  }
}

export class Empty {}
