import { createStore } from "zustand/vanilla";
import type { AgeRange, NationalityMode } from "@/lib/domain/types";
import type { ControlBounds, Controls } from "@/lib/dashboard/controls";

type State = Controls & {
  bounds: ControlBounds;
  setMinMinutes: (minutes: number) => void;
  setAgeRange: (range: AgeRange) => void;
  setNationality: (mode: NationalityMode) => void;
  setPer90: (on: boolean) => void;
  reset: () => void;
};

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

// Resolved sidebar values; setters behave like the widgets (clamped to the slider range)
export function createControlsStore(bounds: ControlBounds) {
  return createStore<State>((set) => ({
    ...bounds.defaults,
    ageRange: [bounds.defaults.ageRange[0], bounds.defaults.ageRange[1]],
    bounds,
    setMinMinutes: (minutes) =>
      set({ minMinutes: clamp(Math.trunc(minutes), bounds.minutes.min, bounds.minutes.max) }),
    setAgeRange: ([a, b]) => {
      const lo = clamp(Math.min(a, b), bounds.age[0], bounds.age[1]);
      const hi = clamp(Math.max(a, b), bounds.age[0], bounds.age[1]);
      set({ ageRange: [lo, hi] });
    },
    setNationality: (mode) => set({ nationality: mode }),
    // Per-90 needs minutes played; without it the toggle stays off
    setPer90: (on) => set({ per90: on && bounds.hasMinutes }),
    reset: () =>
      set({
        ...bounds.defaults,
        ageRange: [bounds.defaults.ageRange[0], bounds.defaults.ageRange[1]],
      }),
  }));
}

export function selectControls(s: State): Controls {
  return { minMinutes: s.minMinutes, ageRange: s.ageRange, nationality: s.nationality, per90: s.per90 };
}
