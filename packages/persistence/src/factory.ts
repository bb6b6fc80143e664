/**
 * EntityFactory - builds fake entities for seeding and tests.
 *
 *   class ArticleFactory extends EntityFactory<Article> {
 *     newInstance() { return new Article(); }
 *     definition(faker: Faker) {
 *       return { title: faker.lorem.sentence(), views: faker.number.int(500) };
 *     }
 *   }
 *
 *   const drafts = new ArticleFactory({ seed: 7 }).count(3).state({ status: "draft" }).make();
 *
 * count() and state() configure the factory in place and return it.
 */

import {Faker, base, en} from "@faker-js/faker";
import type {Entity} from "@tandem/core";
import type {PersistenceCoordinator} from "./coordinator.js";

export interface EntityFactoryOptions {
  /** Seed for reproducible output */
  seed?: number;
  faker?: Faker;
}

type FactoryState = Record<string, unknown> | ((faker: Faker) => Record<string, unknown>);

export abstract class EntityFactory<T extends Entity> {
  protected readonly faker: Faker;
  private amount = 1;
  private readonly states: FactoryState[] = [];

  constructor(opts: EntityFactoryOptions = {}) {
    this.faker = opts.faker ?? new Faker({ locale: [en, base] });
    if (opts.seed !== undefined) this.faker.seed(opts.seed);
  }

  /** Attribute values for one instance */
  abstract definition(faker: Faker): Record<string, unknown>;

  /** An empty instance to fill */
  abstract newInstance(): T;

  count(n: number): this {
    if (!Number.isSafeInteger(n) || n < 0) throw new RangeError(`count must be a non-negative integer, got ${n}`);
    this.amount = n;
    return this;
  }

  /** Overrides applied after the definition, in call order */
  state(overrides: FactoryState): this {
    this.states.push(overrides);
    return this;
  }

  /** Build without persisting */
  make(): T[] {
    return Array.from({ length: this.amount }, () => this.build());
  }

  makeOne(): T {
    return this.build();
  }

  /** Build and save each; entities that no store accepted are still returned, with exists = false */
  async create(coordinator: PersistenceCoordinator): Promise<T[]> {
    const entities = this.make();
    for (const entity of entities) {
      await coordinator.save(entity);
    }
    return entities;
  }

  private build(): T {
    let attributes = this.definition(this.faker);
    for (const state of this.states) {
      attributes = { ...attributes, ...(typeof state === "function" ? state(this.faker) : state) };
    }
    // Bypasses the mass-assignment guard
    return this.newInstance().forceFill(attributes);
  }
}
