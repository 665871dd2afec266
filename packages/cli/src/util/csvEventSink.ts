import fs from "node:fs";
import path from "node:path";
import type {EventSink, FuzzEvent} from "@slashwatch/oracle";
import {mkdir} from "./file.js";

export const CSV_HEADER = [
  "sequence_number",
  "flow_number",
  "flow_name",
  "block_number",
  "block_timestamp",
  "from",
  "to",
  "return_value",
  "console_logs",
].join(",");

/**
 * Quote a field holding a separator, a quote or a line break
 */
export function csvField(value: string | number): string {
  const str = String(value);
  return /[",\r\n]/.test(str) ? `"${str.replaceAll('"', '""')}"` : str;
}

/**
 * One row per event. The in-memory slasher has no blocks, `block_number` stays empty
 * - flow: action about to run
 * - transaction: command sent, its timestamp, subnetwork and operator, and what it returned
 * - outcome: action result and how many results of this kind the sequence had so far
 */
export function eventToCsvRow(event: FuzzEvent): string {
  let fields: (string | number)[];
  switch (event.type) {
    case "flow":
      fields = [event.sequence, event.flow, event.action, "", "", "", "", "", ""];
      break;
    case "transaction":
      fields = [
        event.sequence,
        event.flow,
        event.command,
        "",
        event.timestamp,
        event.from,
        event.to,
        event.returnValue,
        "",
      ];
      break;
    case "outcome":
      fields = [
        event.sequence,
        event.flow,
        event.action,
        "",
        "",
        "",
        "",
        event.success ? "success" : "failure",
        `count=${event.count}`,
      ];
      break;
  }
  return fields.map(csvField).join(",");
}

/**
 * Appends events to a CSV file. Rows are buffered in write order and appended on flush, appends run
 * one after the other.
 */
export class CsvEventSink implements EventSink {
  private rows: string[] = [];
  private pending: Promise<void> = Promise.resolve();

  constructor(readonly filepath: string) {
    mkdir(path.dirname(filepath));
    fs.writeFileSync(filepath, CSV_HEADER + "\n");
  }

  write(event: FuzzEvent): void {
    this.rows.push(eventToCsvRow(event));
  }

  flush(): Promise<void> {
    const rows = this.rows;
    this.rows = [];
    if (rows.length > 0) {
      const chunk = rows.join("\n") + "\n";
      this.pending = this.pending.then(() => fs.promises.appendFile(this.filepath, chunk));
    }
    return this.pending;
  }
}
