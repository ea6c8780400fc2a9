import { describe, expect, it } from "vitest";
import { PlaceDirectory, PlaceRanker, RadixTree, samePlace, type Place } from "../../index.js";

const londonOn: Place = { name: "London", region: "ON", country: "Canada", latitude: 42.98339, longitude: -81.23304, population: 346765 };
const londonOh: Place = { name: "London", region: "OH", country: "USA", latitude: 39.88645, longitude: -83.44825, population: 9904 };
const londontowne: Place = { name: "Londontowne", region: "MD", country: "USA", latitude: 38.93345, longitude: -76.54941, population: 7200 };

function makeDirectory(): PlaceDirectory {
  const directory = new PlaceDirectory({
    tree: new RadixTree<Place>({ equals: samePlace }),
    ranker: new PlaceRanker(),
  });
  directory.addMany([londonOh, londontowne, londonOn]);
  return directory;
}

describe("PlaceDirectory", () => {
  it("ranks prefix matches by population without an origin", () => {
    const res = makeDirectory().query("Londo");
    expect(res.suggestions).toEqual([
      { name: "London, ON, Canada", latitude: "42.98339", longitude: "-81.23304", score: 0.9 },
      { name: "London, OH, USA", latitude: "39.88645", longitude: "-83.44825", score: 0.3 },
      { name: "Londontowne, MD, USA", latitude: "38.93345", longitude: "-76.54941", score: 0.3 },
    ]);
  });

  it("ranks by distance when given an origin", () => {
    const res = makeDirectory().query("Londo", { origin: { latitude: 43.70011, longitude: -79.4163 } });
    expect(res.suggestions.map((s) => [s.name, s.score])).toEqual([
      ["London, ON, Canada", 0.8],
      ["London, OH, USA", 0.3],
      ["Londontowne, MD, USA", 0.3],
    ]);
  });

  it("narrows on a longer prefix and caps with a limit", () => {
    const directory = makeDirectory();

    expect(directory.getAll("London, O")).toEqual([londonOh, londonOn]);
    expect(directory.query("Londo", { limit: 1 }).suggestions.map((s) => s.name)).toEqual(["London, ON, Canada"]);
    expect(directory.query("Xyz")).toEqual({ suggestions: [] });
  });

  it("stores a place once even when re-added with slightly different coordinates", () => {
    const directory = makeDirectory();

    expect(directory.add({ ...londonOn, latitude: 42.984 })).toBe(false);
    expect(directory.add(londonOn)).toBe(false);
    expect(directory.size).toBe(3);
  });

  it("adds, finds and removes by display name", () => {
    const directory = makeDirectory();
    const paris: Place = { name: "Paris", region: "ON", country: "Canada", latitude: 43.2, longitude: -80.38333, population: 11177 };

    expect(directory.has(paris)).toBe(false);
    expect(directory.add(paris)).toBe(true);
    expect(directory.has(paris)).toBe(true);
    expect(directory.remove(paris)).toBe(true);
    expect(directory.remove(paris)).toBe(false);
    expect(directory.has(paris)).toBe(false);
  });

  it("reset empties the directory", () => {
    const directory = makeDirectory();
    directory.reset();

    expect(directory.size).toBe(0);
    expect(directory.getAll("")).toEqual([]);
  });
});
