import { afterEach, describe, expect, it, vi } from "vitest";
import { createBuffer } from "../core/buffer";
import { emptyFormatState } from "../core/types";
import {
  applyToolbarCommand,
  buildToolbarItems,
  isToolbarCommandId,
  type ToolbarCommand,
} from "./toolbar";

function commands(items: ReturnType<typeof buildToolbarItems>): ToolbarCommand[] {
  return items.flatMap((item) => (item.type === "command" ? [item.command] : []));
}

describe("buildToolbarItems", () => {
  it("groups commands with dividers", () => {
    const items = buildToolbarItems(emptyFormatState);

    expect(items).toHaveLength(16);
    expect(items[0]).toEqual({
      type: "command",
      command: {
        id: "bold",
        tooltip: "Bold",
        shortcut: "Mod-b",
        isActive: false,
      },
    });
    expect(items[2]).toEqual({ type: "divider" });
    expect(items[3]).toEqual({
      type: "command",
      command: { id: "h1", tooltip: "Heading 1", label: "H1", isActive: false },
    });
    expect(commands(items).map((command) => command.id)).toEqual([
      "bold",
      "italic",
      "h1",
      "h2",
      "h3",
      "inline_code",
      "code_block",
      "bullet_list",
      "numbered_list",
      "quote",
      "link",
      "horizontal_rule",
    ]);
  });

  it("marks commands active from the format state", () => {
    const active = commands(
      buildToolbarItems({ ...emptyFormatState, isBold: true, headingLevel: 2 }),
    )
      .filter((command) => command.isActive)
      .map((command) => command.id);

    expect(active).toEqual(["bold", "h2"]);
  });

  it("localizes tooltips", () => {
    const [bold] = commands(buildToolbarItems(emptyFormatState, { locale: "ru" }));
    expect(bold.tooltip).toBe("Жирный");
  });
});

describe("applyToolbarCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the command for an id", () => {
    expect(applyToolbarCommand(createBuffer("x", 0, 1), "bold")).toEqual({
      text: "**x**",
      selection: { start: 2, end: 3 },
    });
    expect(applyToolbarCommand(createBuffer("Title"), "h2").text).toBe(
      "## Title",
    );
  });

  it("passes settings through", () => {
    expect(
      applyToolbarCommand(createBuffer(""), "link", { locale: "ru" }).text,
    ).toBe("[текст](url)");
  });

  it("warns and leaves the buffer alone for an unknown id", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const buffer = createBuffer("text");

    expect(applyToolbarCommand(buffer, "undo")).toBe(buffer);
    expect(warn).toHaveBeenCalledWith("Unknown toolbar command: undo");
  });

  it("recognises command ids", () => {
    expect(isToolbarCommandId("quote")).toBe(true);
    expect(isToolbarCommandId("undo")).toBe(false);
  });
});
