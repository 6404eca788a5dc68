import { describe, expect, it } from "vitest";

import { MemoryLogger } from "../src/logger.js";
import { filterElements, getInteractiveElements, parseBounds } from "../src/sanitizer.js";

const DUMP = `<?xml version='1.0' encoding='UTF-8' standalone='yes' ?>
<hierarchy rotation="0">
  <node index="0" text="" resource-id="" class="android.widget.FrameLayout" content-desc="" clickable="false" enabled="true" bounds="[0,0][1080,2400]">
    <node index="0" text="Wi-Fi" resource-id="android:id/title" class="android.widget.TextView" content-desc="" clickable="true" enabled="true" checked="false" bounds="[40,300][1040,400]" />
    <node index="1" text="" resource-id="com.example:id/search" class="android.widget.EditText" content-desc="" clickable="true" enabled="true" focused="true" hint="Search settings" bounds="[40,100][1040,200]" />
    <node index="2" text="Hidden" resource-id="" class="android.widget.TextView" content-desc="" clickable="true" enabled="true" bounds="[10,10][10,50]" />
    <node index="3" text="" resource-id="" class="android.widget.ImageView" content-desc="Battery" clickable="false" enabled="false" bounds="[900,20][1000,60]" />
  </node>
</hierarchy>`;

describe("getInteractiveElements", () => {
  it("keeps interactive and labelled nodes with their state", () => {
    const elements = getInteractiveElements(DUMP);

    expect(elements.map((e) => e.text)).toEqual(["Wi-Fi", "", "Battery"]);
    expect(elements[0]).toMatchObject({
      id: "android:id/title",
      type: "TextView",
      center: [540, 350],
      size: [1000, 100],
      action: "tap",
      parent: "FrameLayout",
      depth: 1,
    });
    expect(elements[1]).toMatchObject({ editable: true, focused: true, hint: "Search settings", action: "type" });
    expect(elements[2]).toMatchObject({ enabled: false, action: "read" });
  });

  it("returns an empty list and warns for malformed XML", () => {
    const logger = new MemoryLogger();
    expect(getInteractiveElements("<hierarchy><node", logger)).toEqual([]);
    expect(logger.getEntries("warn")).toHaveLength(1);
  });
});

describe("filterElements", () => {
  it("ranks by relevance and compacts", () => {
    const compact = filterElements(getInteractiveElements(DUMP), 2);

    expect(compact).toEqual([
      { text: "", center: [540, 150], action: "type", focused: true, hint: "Search settings", editable: true },
      { text: "Wi-Fi", center: [540, 350], action: "tap" },
    ]);
  });
});

describe("helpers", () => {
  it("parses bounds", () => {
    expect(parseBounds("[0,0][1080,2400]")).toEqual([0, 0, 1080, 2400]);
    expect(parseBounds("0,0,1,1")).toBeNull();
  });
});
