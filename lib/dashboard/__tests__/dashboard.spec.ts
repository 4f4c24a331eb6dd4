import { describe, it, expect } from "vitest";
import { deriveControlBounds, type Controls } from "@/lib/dashboard/controls";
import { buildDashboard } from "@/lib/dashboard/build";
import { metricTitle } from "@/lib/dashboard/metrics";
import { createControlsStore, selectControls } from "@/lib/state/controls-store";
import { makeTable } from "@/lib/leaders/__tests__/fixtures";

const table = makeTable([
  { player: "Ali", team: "GS", age: 19, country: "Türkiye", minutesPlayed: 2700, goals: 12, tackles: 30, accuratePassesPercentage: 88.4 },
  { player: "Marco", team: "FB", age: 33, country: "Italy", minutesPlayed: 450.5, goals: 4, tackles: 41, accuratePassesPercentage: 91 },
  { player: "Emre", team: "BJK", age: 27, country: "Türkiye", minutesPlayed: 1350, goals: 6, tackles: 12, accuratePassesPercentage: 79.5 },
]);

describe("deriveControlBounds", () => {
  it("derives slider ranges from the table", () => {
    const bounds = deriveControlBounds(table);
    expect(bounds.minutes).toEqual({ min: 0, max: 2700, step: 90 });
    expect(bounds.age).toEqual([19, 33]);
    expect(bounds.ageColumn).toBe("age");
    expect(bounds.defaults).toEqual({ minMinutes: 300, ageRange: [19, 33], nationality: "all", per90: true });
  });

  it("falls back when minutes and ages are unavailable", () => {
    const bounds = deriveControlBounds(makeTable([{ player: "A", team: "X", goals: 1 }]));
    expect(bounds.minutes.max).toBe(0);
    expect(bounds.age).toEqual([16, 45]);
    expect(bounds.defaults).toEqual({ minMinutes: 0, ageRange: [16, 45], nationality: "all", per90: false });
  });

  it("falls back when every player has the same age", () => {
    const bounds = deriveControlBounds(makeTable([{ player: "A", age_x: 25 }, { player: "B", age_x: 25 }]));
    expect(bounds.age).toEqual([16, 45]);
  });
});

describe("controls store", () => {
  it("clamps values to the slider bounds", () => {
    const store = createControlsStore(deriveControlBounds(table));
    store.getState().setMinMinutes(5000);
    expect(store.getState().minMinutes).toBe(2700);
    store.getState().setMinMinutes(-10);
    expect(store.getState().minMinutes).toBe(0);
    store.getState().setAgeRange([40, 10]);
    expect(store.getState().ageRange).toEqual([19, 33]);
    store.getState().setAgeRange([25, 21]);
    expect(store.getState().ageRange).toEqual([21, 25]);
  });

  it("keeps per 90 off when there are no minutes", () => {
    const store = createControlsStore(deriveControlBounds(makeTable([{ player: "A", goals: 1 }])));
    store.getState().setPer90(true);
    expect(store.getState().per90).toBe(false);
  });

  it("resets to the defaults", () => {
    const store = createControlsStore(deriveControlBounds(table));
    store.getState().setNationality("foreign");
    store.getState().setMinMinutes(900);
    store.getState().reset();
    expect(selectControls(store.getState())).toEqual({
      minMinutes: 300,
      ageRange: [19, 33],
      nationality: "all",
      per90: true,
    });
  });
});

describe("metricTitle", () => {
  it("turns a percentage suffix into a sign", () => {
    expect(metricTitle("accurateLongBallsPercentage")).toBe("Accuratelongballs %");
    expect(metricTitle("goals")).toBe("Goals");
  });
});

describe("buildDashboard", () => {
  const controls: Controls = { minMinutes: 0, ageRange: [16, 45], nationality: "all", per90: true };

  it("renders a card for each metric present in the table", () => {
    const model = buildDashboard(table, controls, { homeCountry: "Türkiye" });
    expect(model.sections.map((s) => [s.group, s.cards.map((c) => c.metric)])).toEqual([
      ["Attacking", ["goals"]],
      ["Possession & Passing", ["accuratePassesPercentage"]],
      ["Defending", ["tackles"]],
    ]);
    expect(model.playersInView).toBe(3);
  });

  it("uses per 90 for counts but never for percentages", () => {
    const model = buildDashboard(table, controls, { homeCountry: "Türkiye" });
    const [goals] = model.sections[0].cards;
    const [passing] = model.sections[1].cards;
    expect(goals.per90).toBe(true);
    expect(goals.leaderboard.rankingColumn).toBe("goals_per90");
    expect(goals.subtitle).toBe("Top 10 · Goals");
    expect(passing.per90).toBe(false);
    expect(passing.title).toBe("Accuratepasses %");
    expect(passing.leaderboard.rankingColumn).toBe("accuratePassesPercentage");
  });

  it("adds age and country to every leaderboard", () => {
    const model = buildDashboard(table, { ...controls, per90: false }, { homeCountry: "Türkiye" });
    const tackles = model.sections[2].cards[0].leaderboard;
    expect(tackles.columns).toEqual(["Rk", "player", "team", "Tackles", "Age", "Country"]);
    expect(tackles.rows[0]).toEqual({ Rk: 1, player: "Marco", team: "FB", Tackles: "41", Age: "33", Country: "Italy" });
  });

  it("applies the sidebar filters before ranking", () => {
    const model = buildDashboard(
      table,
      { minMinutes: 900, ageRange: [16, 30], nationality: "home", per90: false },
      { homeCountry: "Türkiye" }
    );
    expect(model.playersInView).toBe(2);
    expect(model.sections[0].cards[0].leaderboard.rows.map((r) => r.player)).toEqual(["Ali", "Emre"]);
  });
});
