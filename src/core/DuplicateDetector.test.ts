import { describe, it, expect } from "vitest";
import { contentSignature, findDuplicates } from "./DuplicateDetector";
import { BeatmapIndex } from "../struct/BeatmapIndex";
import { BeatmapSet } from "../struct/BeatmapSet";
import { makeSet } from "../testing/fixtures";

const folders = (index: BeatmapIndex) =>
  findDuplicates(index).map((group) => group.sets.map((set) => set.folderPath));

describe("findDuplicates", () => {
  it("groups folders sharing a beatmapset id in folder order", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/100 Artist - Song (copy)", [{ beatmapSetId: 100 }]),
      makeSet("/beatmaps/100 Artist - Song", [{ beatmapSetId: 100 }]),
      makeSet("/beatmaps/200 Other - Tune", [{ beatmapSetId: 200 }]),
    ]);

    const groups = findDuplicates(index);

    expect(groups).toHaveLength(1);
    expect(groups[0].reason).toBe("beatmapSetId");
    expect(groups[0].key).toBe("100");
    expect(groups[0].sets.map((set) => set.folderPath)).toEqual([
      "/beatmaps/100 Artist - Song",
      "/beatmaps/100 Artist - Song (copy)",
    ]);
  });

  it("returns nothing when every set is distinct", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/a", [{ beatmapSetId: 1 }]),
      makeSet("/beatmaps/b", [{ beatmapSetId: 2 }]),
      makeSet("/beatmaps/c", [{ title: "Local" }]),
    ]);
    expect(findDuplicates(index)).toEqual([]);
  });

  it("compares unsubmitted sets by normalized title, artist and creator", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/x1", [{ title: "Love  Song", artist: "ARTIST ", creator: "mapper" }]),
      makeSet("/beatmaps/x2", [{ title: " love song", artist: "Artist", creator: "Mapper" }]),
      makeSet("/beatmaps/x3", [{ title: "Love Song", artist: "Artist", creator: "Someone" }]),
    ]);

    const groups = findDuplicates(index);

    expect(groups).toHaveLength(1);
    expect(groups[0].reason).toBe("signature");
    expect(groups[0].sets.map((set) => set.folderPath)).toEqual(["/beatmaps/x1", "/beatmaps/x2"]);
  });

  it("requires the same chart count for unsubmitted sets", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/x1", [{ difficultyName: "Easy" }]),
      makeSet("/beatmaps/x2", [{ difficultyName: "Easy" }, { difficultyName: "Hard" }]),
    ]);
    expect(findDuplicates(index)).toEqual([]);
  });

  it("never pairs a submitted set with an unsubmitted one", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/a", [{ beatmapSetId: 100 }]),
      makeSet("/beatmaps/b", [{ beatmapSetId: 0 }]),
    ]);
    expect(findDuplicates(index)).toEqual([]);
  });

  it("ignores sets without charts", () => {
    const index = new BeatmapIndex([
      new BeatmapSet("/beatmaps/empty-1", "fp", []),
      new BeatmapSet("/beatmaps/empty-2", "fp", []),
    ]);
    expect(findDuplicates(index)).toEqual([]);
  });

  it("puts every member of a chain in one group", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/c", [{ beatmapSetId: 7 }]),
      makeSet("/beatmaps/a", [{ beatmapSetId: 7 }]),
      makeSet("/beatmaps/b", [{ beatmapSetId: 7 }]),
    ]);
    expect(folders(index)).toEqual([["/beatmaps/a", "/beatmaps/b", "/beatmaps/c"]]);
  });

  it("orders groups by size, then by their first folder", () => {
    const index = new BeatmapIndex([
      makeSet("/beatmaps/z1", [{ beatmapSetId: 3 }]),
      makeSet("/beatmaps/z2", [{ beatmapSetId: 3 }]),
      makeSet("/beatmaps/m1", [{ beatmapSetId: 2 }]),
      makeSet("/beatmaps/m2", [{ beatmapSetId: 2 }]),
      makeSet("/beatmaps/m3", [{ beatmapSetId: 2 }]),
      makeSet("/beatmaps/a1", [{ beatmapSetId: 1 }]),
      makeSet("/beatmaps/a2", [{ beatmapSetId: 1 }]),
    ]);

    expect(folders(index)).toEqual([
      ["/beatmaps/m1", "/beatmaps/m2", "/beatmaps/m3"],
      ["/beatmaps/a1", "/beatmaps/a2"],
      ["/beatmaps/z1", "/beatmaps/z2"],
    ]);
  });
});

describe("contentSignature", () => {
  it("does not depend on chart order or repeated tuples", () => {
    const a = makeSet("/a", [{ title: "One" }, { title: "Two" }, { title: "Two" }]);
    const b = makeSet("/b", [{ title: "two" }, { title: "ONE" }, { title: "Two" }]);
    expect(contentSignature(a)).toBe(contentSignature(b));
    expect(contentSignature(a)).toBe(
      '[3,[["one","artist","mapper"],["two","artist","mapper"]]]'
    );
  });

  it("keeps field boundaries when a title or artist contains a separator", () => {
    const a = makeSet("/beatmaps/x1", [{ title: "A|B", artist: "C" }]);
    const b = makeSet("/beatmaps/x2", [{ title: "A", artist: "B|C" }]);

    expect(contentSignature(a)).not.toBe(contentSignature(b));
    expect(findDuplicates(new BeatmapIndex([a, b]))).toEqual([]);
  });
});
