import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { EventParseError } from "@stepwright/shared";
import { convertAction, convertRecording, repairTimestamp } from "../src/ingest/recorder";

function loadRecording(): unknown {
  const fixture = path.join(__dirname, "fixtures", "recording.json");
  return JSON.parse(fs.readFileSync(fixture, "utf-8"));
}

describe("convertRecording", () => {
  const session = convertRecording(loadRecording());

  it("builds the session identity from recorder metadata", () => {
    expect(session.session_id).toBe("session-1760868000");
    expect(session.start_time).toBe("2025-10-19T10:00:00.000Z");
    expect(session.end_time).toBe("2025-10-19T10:00:07.000Z");
    expect(session.application).toBe("Firefox Browser");
    expect(session.metadata).toMatchObject({ recorder: "test" });
  });

  it("keeps convertible actions and skips broken, unknown and STOP actions", () => {
    expect(session.events.map((event) => event.event_type)).toEqual([
      "MOUSE_CLICK",
      "TEXT_INPUT",
      "KEY_PRESS",
      "MOUSE_CLICK",
      "KEY_COMBINATION",
      "KEY_COMBINATION",
      "SCROLL",
    ]);
  });

  it("normalises buttons and keys and copies element metadata", () => {
    expect(session.events[0]).toEqual({
      timestamp: "2025-10-19T10:00:00.000Z",
      event_type: "MOUSE_CLICK",
      data: {
        x: 400,
        y: 60,
        button: "left",
        element_name: "Search or enter address",
        element_type: "Edit",
        automation_id: "urlbar-input",
      },
      screenshot_ref: null,
    });
    expect(session.events[2].data).toEqual({ key: "enter" });
  });

  it("drops placeholder element values", () => {
    expect(session.events[1].data).toEqual({ text: "test query" });
  });

  it("repairs a stray marker before a colon in the timestamp", () => {
    expect(session.events[3].timestamp).toBe("2025-10-19T10:00:05.000Z");
    expect(session.events[3].screenshot_ref).toBe("screenshots/0004.png");
  });

  it("tags copy and paste with clipboard intent and content", () => {
    expect(session.events[4].data).toEqual({
      content: "copied text",
      user_intent: "copy_to_clipboard",
      clipboard_content: "copied text",
      keys: ["ctrl", "c"],
    });
    expect(session.events[5].data).toMatchObject({
      user_intent: "paste_from_clipboard",
      keys: ["ctrl", "v"],
    });
  });

  it("falls back to an unknown id and the current time without metadata", () => {
    const empty = convertRecording(
      { actions: [] },
      { application: "Notepad", now: () => new Date("2025-10-19T12:00:00.000Z") },
    );
    expect(empty).toEqual({
      session_id: "session-unknown",
      start_time: "2025-10-19T12:00:00.000Z",
      end_time: null,
      application: "Notepad",
      events: [],
      metadata: {},
    });
  });

  it("writes the recorder start time in the event timestamp form", () => {
    const offset = convertRecording({
      metadata: { startTimeSeconds: 1760868000, startTimeFormatted: "2025-10-19T12:00M:00+02:00" },
      actions: [],
    });
    expect(offset.start_time).toBe("2025-10-19T10:00:00.000Z");
  });

  it("starts at the first event when the recorder start time is unreadable", () => {
    const unreadable = convertRecording({
      metadata: { startTimeFormatted: "yesterday" },
      actions: [
        { command: "PRESS", timestamp: "2025-10-19T10:00:03Z", parameters: { key: "a" } },
        { command: "PRESS", timestamp: "2025-10-19T10:00:01Z", parameters: { key: "b" } },
      ],
    });
    expect(unreadable.start_time).toBe("2025-10-19T10:00:01.000Z");
  });
});

describe("convertAction", () => {
  it("returns null for STOP and unknown commands", () => {
    expect(convertAction({ command: "STOP", timestamp: "2025-10-19T10:00:00Z" }, 0)).toBeNull();
    expect(convertAction({ command: "WAVE", timestamp: "2025-10-19T10:00:00Z" }, 0)).toBeNull();
  });

  it("rejects unparseable timestamps with the action index", () => {
    expect(() =>
      convertAction({ command: "PRESS", timestamp: "not-a-time", parameters: { key: "a" } }, 6),
    ).toThrow("Event 6: unparseable timestamp 'not-a-time'");
  });

  it("rejects payloads that fail the event schema", () => {
    expect(() =>
      convertAction(
        { command: "DRAG", timestamp: "2025-10-19T10:00:00Z", parameters: { start_x: 1 } },
        2,
      ),
    ).toThrow(EventParseError);
  });

  it("rejects key actions without a key", () => {
    expect(() =>
      convertAction({ command: "HOTKEY", timestamp: "2025-10-19T10:00:00Z", parameters: { keys: [] } }, 3),
    ).toThrow(EventParseError);
    expect(() =>
      convertAction({ command: "PRESS", timestamp: "2025-10-19T10:00:00Z", parameters: { key: "" } }, 4),
    ).toThrow(EventParseError);
  });

  it("rejects actions without a command", () => {
    expect(() => convertAction({ timestamp: "2025-10-19T10:00:00Z" }, 0)).toThrow(EventParseError);
  });
});

describe("repairTimestamp", () => {
  it("removes the marker and leaves clean timestamps alone", () => {
    expect(repairTimestamp("2025-10-19T17:56M:47")).toBe("2025-10-19T17:56:47");
    expect(repairTimestamp("2025-10-19T17:56:47Z")).toBe("2025-10-19T17:56:47Z");
  });
});
