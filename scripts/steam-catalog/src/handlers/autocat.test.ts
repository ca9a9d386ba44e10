import pino from "pino";
import { describe, expect, it } from "vitest";
import { DEFAULT_AUTOCAT_OPTIONS, buildAutoCollections, genresOf, releaseYearOf } from "./autocat";

const logger = pino({ level: "silent" });

describe("releaseYearOf", () => {
  it("finds the year in any store locale", () => {
    expect(releaseYearOf("Jul 9, 2013")).toBe(2013);
    expect(releaseYearOf("2013 年 7 月 9 日")).toBe(2013);
    expect(releaseYearOf("2013年7月9日")).toBe(2013);
  });

  it("returns undefined without a year", () => {
    expect(releaseYearOf("Coming soon")).toBeUndefined();
    expect(releaseYearOf("N/A")).toBeUndefined();
  });
});

describe("genresOf", () => {
  it("splits the genre column", () => {
    expect(genresOf("Action, Strategy")).toEqual(["Action", "Strategy"]);
    expect(genresOf("动作，冒险")).toEqual(["动作", "冒险"]);
    expect(genresOf("N/A")).toEqual([]);
  });
});

describe("buildAutoCollections", () => {
  const entries = [
    { appId: 30, genre: "Action, Indie, RPG, Strategy", releaseDate: "Jul 9, 2013" },
    { appId: 10, genre: "Action", releaseDate: "2011 年 2 月 1 日" },
    { appId: 20, genre: "N/A", releaseDate: "Coming soon" },
  ];

  it("groups games by genre and release year", () => {
    expect(
      buildAutoCollections(entries, { ...DEFAULT_AUTOCAT_OPTIONS, maxGenres: 2, ignoredGenres: ["indie"] }, logger),
    ).toEqual([
      { name: "类型-Action", appIds: [10, 30] },
      { name: "类型-RPG", appIds: [30] },
      { name: "年份-2011", appIds: [10] },
      { name: "年份-2013", appIds: [30] },
    ]);
  });

  it("takes every genre when there is no limit", () => {
    const collections = buildAutoCollections(
      entries,
      { genrePrefix: "", yearPrefix: "Year ", maxGenres: 0, ignoredGenres: [] },
      logger,
    );

    expect(collections.map((collection) => collection.name)).toEqual([
      "Action",
      "Indie",
      "RPG",
      "Strategy",
      "Year 2011",
      "Year 2013",
    ]);
  });
});
