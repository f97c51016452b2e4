import { describe, expect, it } from "vitest";
import { detectTerminal, formatCommand, payloadLines, splitResponseLines } from "./framing";

describe("detectTerminal", () => {
  it("waits while only payload has arrived", () => {
    expect(detectTerminal("AT+CSQ\r\n+CSQ: 20,99\r\n")).toBeNull();
  });

  it("recognises the success marker", () => {
    expect(detectTerminal("AT+CSQ\r\n+CSQ: 20,99\r\n\r\nOK\r\n")).toEqual({ kind: "ok" });
  });

  it("ignores an error marker until its line is complete", () => {
    expect(detectTerminal("AT+CPIN?\r\n+CME ERROR: 1")).toBeNull();
    expect(detectTerminal("AT+CPIN?\r\n+CME ERROR: 10\r\n")).toEqual({
      kind: "error",
      code: "10",
      text: "+CME ERROR: 10",
    });
  });

  it("treats a bare ERROR as terminal without a code", () => {
    expect(detectTerminal("AT+FOO\r\nERROR\r\n")).toEqual({ kind: "error", code: null, text: "ERROR" });
  });

  it("does not mistake a payload containing OK for the terminator", () => {
    expect(detectTerminal('+COPS: 0,0,"OK MOBILE",7\r\n')).toBeNull();
  });
});

describe("response lines", () => {
  it("splits on any line ending and drops blank lines", () => {
    expect(splitResponseLines("AT+GMI\r\r\nQuectel\r\n\r\nOK\r\n")).toEqual(["AT+GMI", "Quectel", "OK"]);
  });

  it("strips echo and terminator from the payload", () => {
    expect(payloadLines(["AT+GMI", "Quectel", "OK"], "AT+GMI")).toEqual(["Quectel"]);
  });

  it("terminates commands with CRLF", () => {
    expect(formatCommand("AT+QNWINFO")).toBe("AT+QNWINFO\r\n");
  });
});
