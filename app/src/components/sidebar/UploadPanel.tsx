type UploadPanelProps = {
  fileName: string | null;
  relationName: string;
  onRelationNameChange: (name: string) => void;
  onFileSelected: (file: File) => void;
  onLoad: () => void;
  canLoad: boolean;
  busy: boolean;
  error: string | null;
  success: string | null;
};

export const ACCEPTED_EXTENSIONS = [".csv", ".xlsx", ".xls", ".json", ".parquet"];

export const UploadPanel = ({
  fileName,
  relationName,
  onRelationNameChange,
  onFileSelected,
  onLoad,
  canLoad,
  busy,
  error,
  success
}: UploadPanelProps) => (
  <section className="sidebar-section">
    <p className="eyebrow">Upload a data file</p>
    <label className="primary file-picker">
      Choose a file (CSV, Excel, JSON, Parquet)
      <input
        type="file"
        aria-label="Data file"
        accept={ACCEPTED_EXTENSIONS.join(",")}
        onChange={(event) => {
          const file = event.target.files?.[0];
          if (file) {
            onFileSelected(file);
          }
          event.target.value = "";
        }}
      />
    </label>
    {fileName && <p className="muted subtle">Selected: {fileName}</p>}
    <label className="field">
      <span>Table name for the database</span>
      <input
        type="text"
        value={relationName}
        onChange={(event) => onRelationNameChange(event.target.value)}
      />
    </label>
    <button type="button" className="primary" disabled={!canLoad || busy} onClick={onLoad}>
      {busy ? "Loading…" : "Load into database"}
    </button>
    {error && <div className="callout error-callout">{error}</div>}
    {success && <div className="callout success-callout">{success}</div>}
  </section>
);
