import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeEach, afterEach} from "vitest";
import {ActionName, TransactionEvent} from "@slashwatch/oracle";
import {CSV_HEADER, CsvEventSink, csvField, eventToCsvRow} from "../../../src/util/csvEventSink.js";

const transaction: TransactionEvent = {
  type: "transaction",
  sequence: 1,
  flow: 4,
  action: ActionName.executeSlash,
  command: "executeSlash",
  timestamp: 1840,
  from: "subnetwork-0",
  to: "operator-0",
  returnValue: "100000",
  success: true,
};

describe("csvEventSink", () => {
  it("should quote fields holding separators or quotes", () => {
    expect(csvField(12)).toBe("12");
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField("two\nlines")).toBe('"two\nlines"');
  });

  it("should render one row per event kind", () => {
    expect(eventToCsvRow({type: "flow", sequence: 1, flow: 4, action: ActionName.executeSlash})).toBe(
      "1,4,execute_slash,,,,,,"
    );
    expect(eventToCsvRow(transaction)).toBe("1,4,executeSlash,,1840,subnetwork-0,operator-0,100000,");
    expect(
      eventToCsvRow({type: "outcome", sequence: 1, flow: 4, action: ActionName.executeSlash, success: false, count: 3})
    ).toBe("1,4,execute_slash,,,,,failure,count=3");
  });

  describe("CsvEventSink", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "slashwatch-csv-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, {recursive: true, force: true});
    });

    it("should write the header then append rows in write order on flush", async () => {
      const filepath = path.join(tmpDir, "events", "run.csv");
      const sink = new CsvEventSink(filepath);
      expect(fs.readFileSync(filepath, "utf8")).toBe(CSV_HEADER + "\n");

      sink.write({type: "flow", sequence: 1, flow: 4, action: ActionName.executeSlash});
      sink.write(transaction);
      const first = sink.flush();
      sink.write({type: "outcome", sequence: 1, flow: 4, action: ActionName.executeSlash, success: true, count: 1});
      await Promise.all([first, sink.flush(), sink.flush()]);

      expect(fs.readFileSync(filepath, "utf8").split("\n")).toEqual([
        "sequence_number,flow_number,flow_name,block_number,block_timestamp,from,to,return_value,console_logs",
        "1,4,execute_slash,,,,,,",
        "1,4,executeSlash,,1840,subnetwork-0,operator-0,100000,",
        "1,4,execute_slash,,,,,success,count=1",
        "",
      ]);
    });
  });
});
