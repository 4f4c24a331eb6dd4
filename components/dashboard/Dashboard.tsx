import type { DashboardModel } from "@/lib/dashboard/build";
import { LeaderboardCard } from "@/components/leaders/LeaderboardCard";
import { FilterSummary } from "./FilterSummary";

export function Dashboard({ model }: { model: DashboardModel }) {
  return (
    <main className="block-container">
      <h2 className="opta-page-title">{model.title}</h2>
      <div className="opta-page-description">{model.description}</div>
      <FilterSummary controls={model.controls} playersInView={model.playersInView} />

      {model.sections
        .filter((s) => s.cards.length > 0)
        .map((section) => (
          <section key={section.group} aria-label={section.group}>
            <div className="opta-subtitle">{section.group.toUpperCase()}</div>
            <div className="opta-grid">
              {section.cards.map((card) => (
                <LeaderboardCard
                  key={card.metric}
                  title={card.title}
                  subtitle={card.subtitle}
                  leaderboard={card.leaderboard}
                  per90={card.per90}
                />
              ))}
            </div>
          </section>
        ))}
    </main>
  );
}
