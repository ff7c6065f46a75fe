import { describe, expect, it } from "vitest";
import { toNmlCues, toRekordboxCues } from "../../src/cue-mapping";
import { CueMarker } from "../../src/types";

const nmlCues: CueMarker[] = [
  { type: "grid", start_time_seconds: 0.1, label: "AutoGrid" },
  { type: "hot-cue", start_time_seconds: 12.5, label: "Cue 1" },
  { type: "hot-cue", start_time_seconds: 48, label: "Cue 2" },
  { type: "loop", start_time_seconds: 64, label: "Outro loop" },
  { type: "beat", start_time_seconds: 96, label: "Beat" },
];

describe("toRekordboxCues", () => {
  it("maps types and names without the memory option", () => {
    expect(toRekordboxCues(nmlCues)).toEqual([
      { type: "grid", start_time_seconds: 0.1, label: "Grid" },
      { type: "hot-cue", start_time_seconds: 12.5, label: "Cue 1" },
      { type: "hot-cue", start_time_seconds: 48, label: "Cue 2" },
      { type: "loop", start_time_seconds: 64, label: "Outro loop" },
      { type: "grid", start_time_seconds: 96, label: "Grid" },
    ]);
  });

  it("emits a memory cue ahead of the first hot cue only", () => {
    const mapped = toRekordboxCues(nmlCues, { mapFirstHotCueToMemory: true });
    expect(mapped.map((cue) => `${cue.type}:${cue.label}`)).toEqual([
      "grid:Grid",
      "memory-cue:Memory 2",
      "hot-cue:Cue 1",
      "hot-cue:Cue 2",
      "loop:Outro loop",
      "grid:Grid",
    ]);
    expect(mapped[1].start_time_seconds).toBe(12.5);
  });

  it("numbers the memory cue 1 when the hot cue name has no number", () => {
    const mapped = toRekordboxCues([{ type: "hot-cue", start_time_seconds: 3, label: "Drop" }], {
      mapFirstHotCueToMemory: true,
    });
    expect(mapped[0]).toEqual({ type: "memory-cue", start_time_seconds: 3, label: "Memory 1" });
  });
});

describe("toNmlCues", () => {
  const catalogCues: CueMarker[] = [
    { type: "memory-cue", start_time_seconds: 5, label: "Memory 3" },
    { type: "hot-cue", start_time_seconds: 10, label: "A" },
    { type: "memory-cue", start_time_seconds: 20, label: "Break" },
    { type: "grid", start_time_seconds: 0, label: "Grid" },
  ];

  it("drops memory cues by default", () => {
    expect(toNmlCues(catalogCues).map((cue) => cue.type)).toEqual(["hot-cue", "grid"]);
  });

  it("turns memory cues into hot cues when asked", () => {
    expect(toNmlCues(catalogCues, { mapMemoryToHotCue: true })).toEqual([
      { type: "hot-cue", start_time_seconds: 5, label: "Hot Cue 3" },
      { type: "hot-cue", start_time_seconds: 10, label: "A" },
      { type: "hot-cue", start_time_seconds: 20, label: "Break" },
      { type: "grid", start_time_seconds: 0, label: "Grid" },
    ]);
  });

  it("drops a memory cue that duplicates a hot cue position", () => {
    const cues: CueMarker[] = [
      { type: "memory-cue", start_time_seconds: 12.5, label: "Memory 2" },
      { type: "hot-cue", start_time_seconds: 12.5004, label: "Cue 1" },
    ];
    expect(toNmlCues(cues, { mapMemoryToHotCue: true })).toEqual([
      { type: "hot-cue", start_time_seconds: 12.5004, label: "Cue 1" },
    ]);
  });

  it("keeps the cue count stable over repeated round trips", () => {
    let cues = nmlCues;
    for (let i = 0; i < 3; i++) {
      cues = toNmlCues(toRekordboxCues(cues, { mapFirstHotCueToMemory: true }), { mapMemoryToHotCue: true });
    }
    expect(cues.map((cue) => cue.type)).toEqual(["grid", "hot-cue", "hot-cue", "loop", "grid"]);
  });
});
