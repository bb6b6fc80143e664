/**
 * EntityFactory: seeded fake data, counts, state overrides and create().
 */

import { describe, test, expect } from "vitest";
import type { Faker } from "@faker-js/faker";
import { PersistenceCoordinator } from "../coordinator.js";
import { EntityFactory } from "../factory.js";
import { Article, articleStore, clock } from "./fixtures.js";

class ArticleFactory extends EntityFactory<Article> {
  newInstance(): Article {
    return new Article();
  }

  definition(faker: Faker): Record<string, unknown> {
    return {
      title: faker.lorem.sentence(),
      views: faker.number.int({ min: 1, max: 500 }),
      published: false,
    };
  }
}

describe("EntityFactory", () => {
  test("make builds the requested number of unsaved entities", () => {
    const articles = new ArticleFactory({ seed: 7 }).count(3).make();

    expect(articles).toHaveLength(3);
    for (const article of articles) {
      expect(article.exists).toBe(false);
      expect(typeof article.getAttribute("title")).toBe("string");
      expect(article.getAttribute("views")).toBeGreaterThanOrEqual(1);
    }
  });

  test("the same seed gives the same attributes", () => {
    const a = new ArticleFactory({ seed: 42 }).makeOne();
    const b = new ArticleFactory({ seed: 42 }).makeOne();
    expect(a.getAttributes()).toEqual(b.getAttributes());
  });

  test("states override the definition in order", () => {
    const article = new ArticleFactory({ seed: 1 })
      .state({ published: true, views: 5 })
      .state((faker) => ({ title: `Draft ${faker.number.int({ min: 1, max: 1 })}` }))
      .state({ views: 9 })
      .makeOne();

    expect(article.getAttribute("published")).toBe(true);
    expect(article.getAttribute("views")).toBe(9);
    expect(article.getAttribute("title")).toBe("Draft 1");
  });

  test("attributes outside the fillable list are still set", () => {
    const article = new ArticleFactory({ seed: 1 }).state({ secret: "kept" }).makeOne();
    expect(article.getAttribute("secret")).toBe("kept");
  });

  test("rejects a negative count", () => {
    expect(() => new ArticleFactory().count(-1)).toThrow(RangeError);
  });

  test("create saves each entity through the coordinator", async () => {
    const local = articleStore();
    const coordinator = new PersistenceCoordinator({ local, clock });

    const articles = await new ArticleFactory({ seed: 3 }).count(2).create(coordinator);

    expect(articles.map((a) => a.getKey())).toEqual([1, 2]);
    expect(articles.every((a) => a.exists && a.isClean())).toBe(true);
    expect(await local.table("articles").count()).toBe(2);
  });
});
