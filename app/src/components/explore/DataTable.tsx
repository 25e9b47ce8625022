import type { CellValue, Table } from "../../lib/import/types";

type DataTableProps = {
  table: Table;
  caption?: string;
  maxRows?: number;
  highlightedColumns?: string[];
};

export const formatCell = (cell: CellValue): string => {
  if (cell === null) {
    return "";
  }
  if (typeof cell === "number") {
    return Number.isInteger(cell) ? cell.toString() : cell.toFixed(4).replace(/\.?0+$/, "");
  }
  if (typeof cell === "boolean") {
    return cell ? "true" : "false";
  }
  return cell;
};

export const DataTable = ({
  table,
  caption,
  maxRows = 200,
  highlightedColumns = []
}: DataTableProps) => {
  const visibleRows = Math.min(table.rowCount, maxRows);
  const rowIndices = Array.from({ length: visibleRows }, (_, index) => index);

  return (
    <div className="data-table">
      <div className="data-table-header">
        {caption && <p className="muted">{caption}</p>}
        <span className="pill muted-pill">
          {visibleRows < table.rowCount
            ? `${visibleRows} of ${table.rowCount} rows`
            : `${table.rowCount} rows`}
        </span>
      </div>
      <div className="table-scroll">
        <table>
          <thead>
            <tr>
              <th className="row-index">#</th>
              {table.columns.map((column) => (
                <th
                  key={column.name}
                  className={highlightedColumns.includes(column.name) ? "highlight" : ""}
                  title={column.kind}
                >
                  {column.name}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rowIndices.map((rowIndex) => (
              <tr key={`row-${rowIndex}`}>
                <td className="row-index">{rowIndex + 1}</td>
                {table.columns.map((column) => (
                  <td
                    key={`cell-${rowIndex}-${column.name}`}
                    className={highlightedColumns.includes(column.name) ? "highlight" : ""}
                  >
                    {formatCell(column.values[rowIndex] ?? null)}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
};
