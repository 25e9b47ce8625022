export const NO_TABLES_SENTINEL = "No tables yet";

type RelationPickerProps = {
  relations: string[];
  selected: string | null;
  onSelect: (name: string | null) => void;
};

export const RelationPicker = ({ relations, selected, onSelect }: RelationPickerProps) => {
  const options = relations.length > 0 ? relations : [NO_TABLES_SENTINEL];

  return (
    <section className="sidebar-section">
      <p className="eyebrow">Explore tables</p>
      <label className="field">
        <span>Choose a table</span>
        <select
          value={selected ?? NO_TABLES_SENTINEL}
          disabled={relations.length === 0}
          onChange={(event) => {
            const value = event.target.value;
            onSelect(value === NO_TABLES_SENTINEL ? null : value);
          }}
        >
          {options.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      </label>
    </section>
  );
};
