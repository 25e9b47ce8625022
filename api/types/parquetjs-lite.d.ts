declare module "parquetjs-lite" {
  type ParquetFieldDefinition = {
    type: string;
    optional?: boolean;
    repeated?: boolean;
    compression?: string;
  };

  export class ParquetSchema {
    constructor(fields: Record<string, ParquetFieldDefinition>);
    fields: Record<string, unknown>;
  }

  export class ParquetCursor {
    next(): Promise<Record<string, unknown> | null>;
  }

  export class ParquetReader {
    static openBuffer(buffer: Buffer): Promise<ParquetReader>;
    getCursor(): ParquetCursor;
    getSchema(): ParquetSchema;
    close(): Promise<void>;
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }
}
