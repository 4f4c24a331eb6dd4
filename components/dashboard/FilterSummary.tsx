import { SlidersHorizontal } from "lucide-react";
import type { Controls } from "@/lib/dashboard/controls";
import { NATIONALITY_OPTIONS } from "@/lib/dashboard/controls";

export function FilterSummary({ controls, playersInView }: { controls: Controls; playersInView: number }) {
  const nationality = NATIONALITY_OPTIONS.find((o) => o.value === controls.nationality)?.label ?? controls.nationality;
  return (
    <div className="opta-filters" aria-label="Active filters">
      <SlidersHorizontal className="opta-icon" aria-hidden />
      <span>Min minutes: {controls.minMinutes}</span>
      <span>
        Age: {controls.ageRange[0]}–{controls.ageRange[1]}
      </span>
      <span>{nationality}</span>
      <span>{controls.per90 ? "Per 90 minutes" : "Totals"}</span>
      <span>Players in view: {playersInView}</span>
    </div>
  );
}
