import type { CorrelationMatrix } from "../../lib/explore/summary";

type CorrelationHeatmapProps = {
  matrix: CorrelationMatrix;
};

// -1 → red, 0 → white, 1 → blue
export const heatColor = (value: number | null): string => {
  if (value === null) {
    return "#f1f5f9";
  }
  const intensity = Math.round(Math.min(Math.abs(value), 1) * 200);
  const fade = 255 - intensity;
  return value >= 0 ? `rgb(${fade}, ${fade}, 255)` : `rgb(255, ${fade}, ${fade})`;
};

export const CorrelationHeatmap = ({ matrix }: CorrelationHeatmapProps) => {
  if (matrix.columns.length < 2) {
    return <p className="muted">At least two numeric columns are needed for a correlation heatmap.</p>;
  }

  return (
    <div className="table-scroll">
      <table className="heatmap">
        <thead>
          <tr>
            <th />
            {matrix.columns.map((name) => (
              <th key={name}>{name}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {matrix.columns.map((rowName, rowIndex) => (
            <tr key={rowName}>
              <th>{rowName}</th>
              {matrix.values[rowIndex].map((value, columnIndex) => (
                <td
                  key={`${rowName}-${matrix.columns[columnIndex]}`}
                  style={{ backgroundColor: heatColor(value) }}
                >
                  {value === null ? "n/a" : value.toFixed(2)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
