import { defaultFilter, filterOptions } from "../../lib/explore/pipeline";
import type { FilterSpec } from "../../lib/explore/types";
import type { CellValue, Table } from "../../lib/import/types";
import { formatCell } from "./DataTable";

type FilterControlsProps = {
  table: Table;
  filter: FilterSpec;
  onChange: (next: FilterSpec) => void;
};

const optionLabel = (value: CellValue): string => (value === null ? "(empty)" : formatCell(value));

export const FilterControls = ({ table, filter, onChange }: FilterControlsProps) => {
  const options = filterOptions(table, filter.column);

  const renderRange = () => {
    if (options.kind !== "range" || filter.kind !== "range") {
      return null;
    }
    if (options.min === null || options.max === null) {
      return <p className="muted">This column has no values to filter on.</p>;
    }
    const observedMin = options.min;
    const observedMax = options.max;
    const currentMin = filter.min ?? observedMin;
    const currentMax = filter.max ?? observedMax;
    // both observed bounds must stay selectable

    return (
      <div className="range-filter">
        <label className="field">
          <span>Minimum: {formatCell(currentMin)}</span>
          <input
            type="range"
            aria-label="Minimum value"
            min={observedMin}
            max={observedMax}
            step="any"
            value={currentMin}
            onChange={(event) =>
              onChange({ ...filter, min: Math.min(Number(event.target.value), currentMax) })
            }
          />
        </label>
        <label className="field">
          <span>Maximum: {formatCell(currentMax)}</span>
          <input
            type="range"
            aria-label="Maximum value"
            min={observedMin}
            max={observedMax}
            step="any"
            value={currentMax}
            onChange={(event) =>
              onChange({ ...filter, max: Math.max(Number(event.target.value), currentMin) })
            }
          />
        </label>
      </div>
    );
  };

  const renderSet = () => {
    if (options.kind !== "set" || filter.kind !== "set") {
      return null;
    }
    if (options.values.length === 0) {
      return <p className="muted">This column has no values to filter on.</p>;
    }
    const toggle = (value: CellValue) => {
      const selected = filter.values.includes(value)
        ? filter.values.filter((candidate) => candidate !== value)
        : [...filter.values, value];
      onChange({ ...filter, values: selected });
    };

    return (
      <div className="set-filter">
        <div className="chip-row">
          <button type="button" className="ghost" onClick={() => onChange({ ...filter, values: options.values })}>
            Select all
          </button>
          <button type="button" className="ghost" onClick={() => onChange({ ...filter, values: [] })}>
            Clear
          </button>
        </div>
        <div className="checkbox-list">
          {options.values.map((value) => (
            <label key={optionLabel(value)} className="checkbox-row">
              <input
                type="checkbox"
                checked={filter.values.includes(value)}
                onChange={() => toggle(value)}
              />
              <span>{optionLabel(value)}</span>
            </label>
          ))}
        </div>
      </div>
    );
  };

  return (
    <div className="filter-controls">
      <label className="field">
        <span>Column to filter by</span>
        <select
          value={filter.column}
          onChange={(event) => onChange(defaultFilter(table, event.target.value))}
        >
          {table.columns.map((column) => (
            <option key={column.name} value={column.name}>
              {column.name}
            </option>
          ))}
        </select>
      </label>
      {renderRange()}
      {renderSet()}
    </div>
  );
};
