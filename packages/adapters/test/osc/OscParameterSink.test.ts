import { describe, it, expect, beforeEach } from "vitest";
import { OscParameterSink } from "../../src/osc/OscParameterSink";
import type { OscMessage, OscTransport } from "../../src/osc/OscTransport";

/**
 * Mock OSC transport that records every message.
 */
class MockOscTransport implements OscTransport {
  sent: OscMessage[] = [];
  failWith: Error | null = null;

  async send(message: OscMessage): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}

describe("OscParameterSink", () => {
  let transport: MockOscTransport;
  let sink: OscParameterSink;

  beforeEach(() => {
    transport = new MockOscTransport();
    sink = new OscParameterSink(transport);
  });

  it("publishes parameters under /motion", async () => {
    await sink.sendParameter("hipTilt", 0.25);
    await sink.sendParameter("chordZone", 3);

    expect(transport.sent).toEqual([
      { address: "/motion/hipTilt", args: [0.25] },
      { address: "/motion/chordZone", args: [3] },
    ]);
  });

  it("publishes controls under /control, per voice when addressed", async () => {
    await sink.sendControlChange("filter", -0.5);
    await sink.sendControlChange("pitchBend", 0.3, "chord-root");

    expect(transport.sent).toEqual([
      { address: "/control/filter", args: [-0.5] },
      { address: "/control/pitchBend/chord-root", args: [0.3] },
    ]);
  });

  it("publishes notes with their voice", async () => {
    await sink.sendNoteOn("right", 60, 100);
    await sink.sendNoteOff("right");

    expect(transport.sent).toEqual([
      { address: "/note/on", args: ["right", 60, 100] },
      { address: "/note/off", args: ["right"] },
    ]);
  });

  it("prefixes addresses when configured", async () => {
    sink = new OscParameterSink(transport, { id: "stage", addressPrefix: "/performer1/" });
    await sink.sendParameter("energy", 0.5);

    expect(sink.id).toBe("stage");
    expect(transport.sent).toEqual([{ address: "/performer1/motion/energy", args: [0.5] }]);
  });

  it("passes transport failures back to the caller", async () => {
    transport.failWith = new Error("socket closed");
    await expect(sink.sendParameter("energy", 0.5)).rejects.toThrow("socket closed");
  });

  it("defaults its id to osc", () => {
    expect(sink.id).toBe("osc");
  });
});
