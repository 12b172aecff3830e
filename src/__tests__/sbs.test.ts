import { describe, expect, it } from "vitest";
import { decodeSbsLine, hasPosition, isStateUpdate, isValidHex, messageTimestamp, toAircraftUpdate } from "../sbs.js";

const fullRecord = "MSG,3,1,1,A1B2C3,1,2024/01/01,00:00:00,2024/01/01,00:00:00,UAL123,35000,450,90,40.1,-75.2,,,,,,0";

describe("decodeSbsLine()", () => {
  it("maps every positional field of a 22-field record", () => {
    const msg = decodeSbsLine(fullRecord);

    expect(msg.messageType).toBe("MSG");
    expect(msg.transmissionType).toBe("3");
    expect(msg.hex).toBe("A1B2C3");
    expect(msg.generatedDate).toBe("2024/01/01");
    expect(msg.generatedTime).toBe("00:00:00");
    expect(msg.callsign).toBe("UAL123");
    expect(msg.altitude).toBe("35000");
    expect(msg.groundSpeed).toBe("450");
    expect(msg.track).toBe("90");
    expect(msg.lat).toBe("40.1");
    expect(msg.lon).toBe("-75.2");
    expect(msg.squawk).toBe("");
    expect(msg.isOnGround).toBe("0");
  });

  it("uppercases the aircraft identifier and trims fields", () => {
    const msg = decodeSbsLine("MSG,1,1,1, a1b2c3 ,1,,,,,UAL123  ");
    expect(msg.hex).toBe("A1B2C3");
    expect(msg.callsign).toBe("UAL123");
  });

  it("pads short records with blanks", () => {
    const msg = decodeSbsLine("MSG,3,1,1,abc123");
    expect(msg.hex).toBe("ABC123");
    expect(msg.callsign).toBe("");
    expect(msg.lat).toBe("");
    expect(msg.isOnGround).toBe("");
  });

  it("ignores fields past the 22nd", () => {
    const msg = decodeSbsLine(`${fullRecord},EXTRA,MORE`);
    expect(msg.isOnGround).toBe("0");
  });

  it("does not throw on garbage", () => {
    const msg = decodeSbsLine("not a record at all");
    expect(msg.messageType).toBe("NOT A RECORD AT ALL");
    expect(msg.hex).toBe("");
    expect(isStateUpdate(msg)).toBe(false);
  });
});

describe("isStateUpdate()", () => {
  it("accepts only MSG records", () => {
    expect(isStateUpdate(decodeSbsLine(fullRecord))).toBe(true);
    expect(isStateUpdate(decodeSbsLine("STA,,5,179,400AE7,10103,2024/01/01,00:00:00,2024/01/01,00:00:00,RM"))).toBe(false);
    expect(isStateUpdate(decodeSbsLine("AIR,,333,5,4CA4E5,27215"))).toBe(false);
  });
});

describe("isValidHex()", () => {
  it("requires six hex digits", () => {
    expect(isValidHex("A1B2C3")).toBe(true);
    expect(isValidHex("A1B2C")).toBe(false);
    expect(isValidHex("ZZZZZZ")).toBe(false);
    expect(isValidHex("")).toBe(false);
  });
});

describe("toAircraftUpdate()", () => {
  it("parses the fields the record carries", () => {
    expect(toAircraftUpdate(decodeSbsLine(fullRecord))).toEqual({
      callsign: "UAL123",
      altitude: 35000,
      groundSpeed: 450,
      heading: 90,
      lat: 40.1,
      lon: -75.2,
      grounded: false,
    });
  });

  it("leaves blank and unparseable fields undefined", () => {
    const update = toAircraftUpdate(decodeSbsLine("MSG,5,1,1,A1B2C3,1,,,,,,abc,,,,,,,,,,"));
    expect(update.altitude).toBeUndefined();
    expect(update.callsign).toBeUndefined();
    expect(update.grounded).toBeUndefined();
  });

  it("reads -1 and 1 as set flags", () => {
    const update = toAircraftUpdate(decodeSbsLine("MSG,4,1,1,A1B2C3,1,,,,,,,,,,,-64,7500,-1,1,0,-1"));
    expect(update.verticalRate).toBe(-64);
    expect(update.squawk).toBe("7500");
    expect(update.alert).toBe(true);
    expect(update.emergency).toBe(true);
    expect(update.spi).toBe(false);
    expect(update.grounded).toBe(true);
  });

  it("drops coordinates outside the valid range", () => {
    const update = toAircraftUpdate(decodeSbsLine("MSG,3,1,1,A1B2C3,1,,,,,,,,,95.5,-75.2"));
    expect(update.lat).toBeUndefined();
    expect(update.lon).toBe(-75.2);
    expect(hasPosition(update)).toBe(false);
  });
});

describe("messageTimestamp()", () => {
  it("reads the generated date and time as UTC", () => {
    expect(messageTimestamp(decodeSbsLine(fullRecord), 0)).toBe(Date.UTC(2024, 0, 1, 0, 0, 0));
  });

  it("keeps milliseconds", () => {
    const msg = decodeSbsLine("MSG,3,1,1,A1B2C3,1,2024/03/05,12:34:56.789");
    expect(messageTimestamp(msg, 0)).toBe(Date.UTC(2024, 2, 5, 12, 34, 56, 789));
  });

  it("falls back to the logged time, then to the receipt time", () => {
    const logged = decodeSbsLine("MSG,3,1,1,A1B2C3,1,,,2024/01/02,03:04:05");
    expect(messageTimestamp(logged, 42)).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));

    const neither = decodeSbsLine("MSG,3,1,1,A1B2C3");
    expect(messageTimestamp(neither, 42)).toBe(42);
  });
});
