// src/core/processor/markers.ts
// Line classification by marker substring

import type { Markers } from "../config/config";

export class MarkerMatcher {
  constructor(readonly markers: Readonly<Markers>) {}

  isBeginSpec(line: string): boolean {
    return line.includes(this.markers.beginSpec);
  }

  // An end-output line usually contains the end-spec token too; it never counts as one.
  isEndSpec(line: string): boolean {
    return line.includes(this.markers.endSpec) && !this.isEndOutput(line);
  }

  isEndOutput(line: string): boolean {
    return line.includes(this.markers.endOutput);
  }
}
