import { useCallback, useEffect, useMemo, useState } from "react";
import "./App.css";
import { AggregatePanel } from "./components/explore/AggregatePanel";
import { CorrelationHeatmap } from "./components/explore/CorrelationHeatmap";
import { DataTable } from "./components/explore/DataTable";
import { FilterControls } from "./components/explore/FilterControls";
import { HistogramGrid } from "./components/explore/HistogramGrid";
import { SummaryStats } from "./components/explore/SummaryStats";
import { RelationPicker } from "./components/sidebar/RelationPicker";
import { UploadPanel } from "./components/sidebar/UploadPanel";
import {
  createAuditEntry,
  formatAuditEntry,
  formatTimestamp,
  type AuditEntry
} from "./lib/audit";
import { fetchRelation, listRelations, persistRelation, uploadFile } from "./lib/explore/api";
import { downloadCsv, exportFileName } from "./lib/explore/exportCsv";
import { defaultAggregate, defaultFilter, runPipeline } from "./lib/explore/pipeline";
import { correlationMatrix, summarizeTable } from "./lib/explore/summary";
import type { AggregateSpec, ChartType, FilterSpec, PipelineResult } from "./lib/explore/types";
import { sliceTable, type Table } from "./lib/import/types";

type UploadState = {
  fileName: string;
  table: Table;
};

const PREVIEW_ROWS = 5;

const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error && error.message ? error.message : fallback;

function App() {
  const [relations, setRelations] = useState<string[]>([]);
  const [selectedRelation, setSelectedRelation] = useState<string | null>(null);
  const [table, setTable] = useState<Table | null>(null);
  const [tableError, setTableError] = useState<string | null>(null);
  const [relationsError, setRelationsError] = useState<string | null>(null);
  const [upload, setUpload] = useState<UploadState | null>(null);
  const [uploadFileName, setUploadFileName] = useState<string | null>(null);
  const [uploadError, setUploadError] = useState<string | null>(null);
  const [loadSuccess, setLoadSuccess] = useState<string | null>(null);
  const [relationName, setRelationName] = useState("my_table");
  const [busy, setBusy] = useState(false);
  const [filter, setFilter] = useState<FilterSpec | null>(null);
  const [aggregateSpec, setAggregateSpec] = useState<AggregateSpec | null>(null);
  const [chartType, setChartType] = useState<ChartType>("bar");
  const [auditEntries, setAuditEntries] = useState<AuditEntry[]>([]);

  const record = useCallback((entry: AuditEntry) => {
    setAuditEntries((prev) => [entry, ...prev]);
  }, []);

  const refreshRelations = useCallback(async (): Promise<string[]> => {
    const names = await listRelations();
    setRelations(names);
    setRelationsError(null);
    return names;
  }, []);

  useEffect(() => {
    refreshRelations()
      .then((names) => {
        setSelectedRelation((current) => current ?? names[0] ?? null);
      })
      .catch((error: unknown) => {
        setRelationsError(errorMessage(error, "Unable to list tables."));
      });
  }, [refreshRelations]);

  useEffect(() => {
    if (!selectedRelation) {
      setTable(null);
      return;
    }
    let cancelled = false;
    setTableError(null);
    fetchRelation(selectedRelation)
      .then((next) => {
        if (cancelled) {
          return;
        }
        setTable(next);
        setFilter(next.columns[0] ? defaultFilter(next, next.columns[0].name) : null);
        setAggregateSpec(defaultAggregate(next));
        record(
          createAuditEntry("TABLE_OPENED", { name: selectedRelation, rowCount: next.rowCount })
        );
      })
      .catch((error: unknown) => {
        if (cancelled) {
          return;
        }
        const message = errorMessage(error, "Unable to read table.");
        setTable(null);
        setTableError(message);
        record(createAuditEntry("TABLE_OPEN_FAILED", { name: selectedRelation, message }));
      });
    return () => {
      cancelled = true;
    };
  }, [record, selectedRelation]);

  const pipeline = useMemo<{ result: PipelineResult | null; error: string | null }>(() => {
    if (!table || !filter) {
      return { result: null, error: null };
    }
    try {
      return { result: runPipeline(table, filter, aggregateSpec), error: null };
    } catch (error) {
      return { result: null, error: errorMessage(error, "Unable to apply filter.") };
    }
  }, [aggregateSpec, filter, table]);

  const summary = useMemo(() => (table ? summarizeTable(table) : null), [table]);
  const correlations = useMemo(() => (table ? correlationMatrix(table) : null), [table]);

  const handleFileSelected = async (file: File) => {
    setUploadError(null);
    setLoadSuccess(null);
    setUpload(null);
    setUploadFileName(file.name);
    record(createAuditEntry("FILE_UPLOADED", { fileName: file.name }));
    try {
      const result = await uploadFile(file);
      setUpload({ fileName: result.fileName, table: result.table });
      record(
        createAuditEntry("FILE_PARSED", {
          fileName: result.fileName,
          rowCount: result.table.rowCount,
          columnCount: result.table.columns.length
        })
      );
    } catch (error) {
      const message = errorMessage(error, "Unknown parse error.");
      setUploadError(message);
      record(createAuditEntry("FILE_PARSE_FAILED", { fileName: file.name, message }));
    }
  };

  const reopenRelation = async (name: string) => {
    setTableError(null);
    try {
      const next = await fetchRelation(name);
      setTable(next);
      setFilter(next.columns[0] ? defaultFilter(next, next.columns[0].name) : null);
      setAggregateSpec(defaultAggregate(next));
      record(createAuditEntry("TABLE_OPENED", { name, rowCount: next.rowCount }));
    } catch (error) {
      const message = errorMessage(error, "Unable to read table.");
      setTable(null);
      setTableError(message);
      record(createAuditEntry("TABLE_OPEN_FAILED", { name, message }));
    }
  };

  const handleLoad = async () => {
    if (!upload) {
      return;
    }
    const name = relationName.trim();
    setBusy(true);
    setUploadError(null);
    setLoadSuccess(null);
    try {
      const result = await persistRelation(name, upload.table);
      setLoadSuccess(`Table '${result.name}' loaded into the database.`);
      record(createAuditEntry("TABLE_LOADED", { name: result.name, rowCount: result.rowCount }));
      await refreshRelations().catch((error: unknown) => {
        setRelationsError(errorMessage(error, "Unable to list tables."));
      });
      if (selectedRelation === result.name) {
        // the selection does not change, so the effect will not re-read the replaced table
        await reopenRelation(result.name);
      } else {
        setSelectedRelation(result.name);
      }
    } catch (error) {
      const message = errorMessage(error, "Unable to load table.");
      setUploadError(message);
      record(createAuditEntry("TABLE_LOAD_FAILED", { name, message }));
    } finally {
      setBusy(false);
    }
  };

  const handleExport = () => {
    if (!pipeline.result || !selectedRelation) {
      return;
    }
    downloadCsv(pipeline.result.filtered, selectedRelation);
    record(
      createAuditEntry("EXPORT_DOWNLOADED", {
        fileName: exportFileName(selectedRelation),
        rowCount: pipeline.result.filtered.rowCount
      })
    );
  };

  const renderExplorer = () => {
    if (!selectedRelation) {
      if (relationsError) {
        return null;
      }
      return (
        <section className="panel empty-state">
          <h3>No tables yet</h3>
          <p className="muted">Upload a file and load it into the database to start exploring.</p>
        </section>
      );
    }
    if (tableError) {
      return <div className="callout error-callout">{tableError}</div>;
    }
    if (!table) {
      return <p className="muted">Loading {selectedRelation}…</p>;
    }

    return (
      <div className="content-stack">
        <section className="panel">
          <header className="panel-header">
            <div>
              <p className="eyebrow">Table</p>
              <h2>Data from {selectedRelation}</h2>
            </div>
          </header>
          {summary && <SummaryStats summary={summary} />}
          <DataTable table={table} />
        </section>

        {filter && (
          <section className="panel">
            <header className="panel-header">
              <div>
                <p className="eyebrow">Filter</p>
                <h3>Filter rows</h3>
              </div>
            </header>
            <FilterControls table={table} filter={filter} onChange={setFilter} />
            {pipeline.error && <div className="callout error-callout">{pipeline.error}</div>}
            {pipeline.result && (
              <DataTable
                table={pipeline.result.filtered}
                caption="Filtered rows"
                highlightedColumns={[filter.column]}
              />
            )}
          </section>
        )}

        {aggregateSpec && (
          <section className="panel">
            <header className="panel-header">
              <div>
                <p className="eyebrow">Group and aggregate</p>
                <h3>Grouped view</h3>
              </div>
            </header>
            <AggregatePanel
              table={table}
              spec={aggregateSpec}
              onSpecChange={setAggregateSpec}
              chartType={chartType}
              onChartTypeChange={setChartType}
              grouped={pipeline.result?.grouped ?? null}
            />
          </section>
        )}

        <section className="panel">
          <header className="panel-header">
            <div>
              <p className="eyebrow">Export</p>
              <h3>Export filtered data</h3>
            </div>
            <button
              type="button"
              className="primary"
              disabled={!pipeline.result}
              onClick={handleExport}
            >
              Download CSV
            </button>
          </header>
        </section>

        <section className="panel">
          <header className="panel-header">
            <div>
              <p className="eyebrow">Distributions</p>
              <h3>Histograms</h3>
            </div>
          </header>
          <HistogramGrid table={table} />
        </section>

        {correlations && (
          <section className="panel">
            <header className="panel-header">
              <div>
                <p className="eyebrow">Correlation</p>
                <h3>Correlation heatmap</h3>
              </div>
            </header>
            <CorrelationHeatmap matrix={correlations} />
          </section>
        )}
      </div>
    );
  };

  return (
    <div className="app-shell">
      <header className="top-header">
        <div className="header-container">
          <div className="brand">
            <div>
              <p className="eyebrow">Table Explorer</p>
              <h1>Universal data analysis</h1>
              <p className="muted">Upload, store, filter, group and export tabular data.</p>
            </div>
          </div>
        </div>
      </header>

      <div className="layout">
        <aside className="sidebar">
          <UploadPanel
            fileName={uploadFileName}
            relationName={relationName}
            onRelationNameChange={setRelationName}
            onFileSelected={(file) => {
              void handleFileSelected(file);
            }}
            onLoad={() => {
              void handleLoad();
            }}
            canLoad={upload !== null && relationName.trim().length > 0}
            busy={busy}
            error={uploadError}
            success={loadSuccess}
          />
          <RelationPicker
            relations={relations}
            selected={selectedRelation}
            onSelect={setSelectedRelation}
          />
          <section className="sidebar-section audit-panel">
            <p className="eyebrow">Activity</p>
            <div className="audit-list compact">
              {auditEntries.slice(0, 6).map((entry) => (
                <article key={entry.id} className="audit-card">
                  <div className="audit-meta">
                    <span>{formatTimestamp(entry.ts)}</span>
                    <span className="tag">{entry.type}</span>
                  </div>
                  <p className="strong">{formatAuditEntry(entry)}</p>
                </article>
              ))}
              {auditEntries.length === 0 && <p className="muted">No activity yet.</p>}
            </div>
          </section>
        </aside>

        <main className="main-container">
          {upload && (
            <section className="panel">
              <header className="panel-header">
                <div>
                  <p className="eyebrow">Upload preview</p>
                  <h3>Preview of {upload.fileName}</h3>
                </div>
              </header>
              <DataTable
                table={sliceTable(upload.table, 0, PREVIEW_ROWS)}
                caption={`First rows of ${upload.table.rowCount}`}
              />
            </section>
          )}
          {relationsError && <div className="callout error-callout">{relationsError}</div>}
          {renderExplorer()}
        </main>
      </div>
    </div>
  );
}

export default App;
