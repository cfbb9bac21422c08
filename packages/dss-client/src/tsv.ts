/**
 * Incremental parser for the `tsv-excel-noheader` export format.
 *
 * Fields are tab-separated, rows newline-separated. A field that starts
 * with a double quote runs until the closing quote; "" inside it is a
 * literal quote. A \r is dropped only as part of a \r\n row break.
 * Chunks may split a row (or a "" pair) anywhere.
 */
export class TsvRowParser {
  private field = '';
  private row: string[] = [];
  private fieldStarted = false;
  private inQuotes = false;
  private quotePending = false;
  private crPending = false;

  push(chunk: string): string[][] {
    const rows: string[][] = [];
    for (const c of chunk) {
      if (this.inQuotes) {
        if (this.quotePending) {
          this.quotePending = false;
          if (c === '"') {
            this.field += '"';
            continue;
          }
          this.inQuotes = false;
        } else if (c === '"') {
          this.quotePending = true;
          continue;
        } else {
          this.field += c;
          continue;
        }
      }

      if (this.crPending) {
        this.crPending = false;
        if (c !== '\n') this.appendCarriageReturn();
      }

      if (c === '\t') {
        this.endField();
      } else if (c === '\n') {
        this.endField();
        rows.push(this.endRow());
      } else if (c === '\r') {
        this.crPending = true;
      } else if (c === '"' && !this.fieldStarted) {
        this.inQuotes = true;
        this.fieldStarted = true;
      } else {
        this.field += c;
        this.fieldStarted = true;
      }
    }
    return rows;
  }

  /** Flush a final row that had no trailing newline. */
  end(): string[][] {
    this.inQuotes = false;
    this.quotePending = false;
    if (this.crPending) {
      this.crPending = false;
      this.appendCarriageReturn();
    }
    if (!this.fieldStarted && this.row.length === 0) return [];
    this.endField();
    return [this.endRow()];
  }

  private appendCarriageReturn(): void {
    this.field += '\r';
    this.fieldStarted = true;
  }

  private endField(): void {
    this.row.push(this.field);
    this.field = '';
    this.fieldStarted = false;
  }

  private endRow(): string[] {
    const row = this.row;
    this.row = [];
    return row;
  }
}
