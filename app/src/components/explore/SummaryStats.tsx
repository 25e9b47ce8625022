import type { TableSummary } from "../../lib/explore/summary";

type SummaryStatsProps = {
  summary: TableSummary;
};

export const SummaryStats = ({ summary }: SummaryStatsProps) => (
  <div className="summary-grid">
    <div className="stat-block">
      <p className="stat-label">Rows</p>
      <p className="stat-value">{summary.rowCount}</p>
    </div>
    <div className="stat-block">
      <p className="stat-label">Columns</p>
      <p className="stat-value">{summary.columnCount}</p>
    </div>
    <div className="stat-block">
      <p className="stat-label">Null rate</p>
      <p className="stat-value">{summary.nullRatePct.toFixed(1)}%</p>
    </div>
    <div className="stat-block">
      <p className="stat-label">Distinct rows</p>
      <p className="stat-value">{summary.distinctRowCount}</p>
    </div>
  </div>
);
