// Approximates the Opta Analyst stats tables: white cards, blue gradient header, zebra rows
export const OPTA_STYLES = `
body { margin: 0; background-color: #0b1120; font-family: system-ui, -apple-system, "Segoe UI", sans-serif; }
.block-container { max-width: 1100px; margin: 0 auto; padding: 1.5rem 1rem; }
.opta-page-title { color: #f9fafb; font-weight: 700; margin-bottom: 0.25rem; }
.opta-page-description { color: #9ca3af; font-size: 0.9rem; margin-bottom: 1rem; }
.opta-filters { display: flex; flex-wrap: wrap; gap: 0.75rem; align-items: center; color: #cbd5e1; font-size: 0.8rem; margin-bottom: 1.25rem; }
.opta-icon { width: 1rem; height: 1rem; vertical-align: -0.15rem; margin-right: 0.35rem; }
.opta-grid { display: grid; grid-template-columns: repeat(2, minmax(0, 1fr)); gap: 1.25rem; }
.opta-card { background: #ffffff; border-radius: 12px; padding: 1rem 1.25rem; box-shadow: 0 10px 30px rgba(15, 23, 42, 0.3); margin-bottom: 1.5rem; }
.opta-title { font-size: 1.1rem; font-weight: 700; color: #0f172a; margin-bottom: 0.4rem; }
.opta-card-subtitle { font-size: 0.75rem; color: #6b7280; margin-bottom: 0.5rem; }
.opta-subtitle { font-size: 0.8rem; font-weight: 500; color: #64748b; text-transform: uppercase; letter-spacing: 0.08em; margin-bottom: 0.4rem; }
.opta-empty { font-size: 0.85rem; color: #6b7280; }
.opta-card table { width: 100%; border-collapse: collapse; font-size: 0.86rem; }
.opta-card thead tr { background: linear-gradient(90deg, #0f172a, #1d4ed8); }
.opta-card th { color: #e5e7eb; font-weight: 600; padding: 0.5rem 0.75rem; text-align: left; border-bottom: 1px solid rgba(15, 23, 42, 0.3); white-space: nowrap; }
.opta-card tbody tr:nth-child(even) { background-color: #f9fafb; }
.opta-card tbody tr:nth-child(odd) { background-color: #ffffff; }
.opta-card tbody tr:hover { background-color: #e5f0ff; }
.opta-card td { padding: 0.45rem 0.75rem; border-bottom: 1px solid #e5e7eb; color: #0f172a; }
.opta-card td:first-child { font-weight: 600; color: #6b7280; }
.opta-card td:nth-child(2) { font-weight: 600; }
@media (max-width: 760px) { .opta-grid { grid-template-columns: minmax(0, 1fr); } }
`;
