export class FormatError extends Error {
  fileKind?: string;

  constructor(message: string, fileKind?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FormatError";
    this.fileKind = fileKind;
  }
}

export class UnsupportedFileTypeError extends Error {
  extension: string;

  constructor(extension: string) {
    super(
      `Unsupported file type "${extension || "(none)"}". Please upload a .csv, .xlsx, .xls, .json or .parquet file.`
    );
    this.name = "UnsupportedFileTypeError";
    this.extension = extension;
  }
}
