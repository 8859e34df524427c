import { BaseXform, type XformNode } from "../base-xform.js";

/**
 * `xl/sharedStrings.xml`: one plain string per `<si>`. Rich-text runs are
 * concatenated and their fonts dropped; phonetic runs are skipped.
 */
class SharedStringsXform extends BaseXform<string[]> {
  private text: string[] = [];
  private inText = false;
  private phoneticDepth = 0;

  constructor() {
    super([]);
  }

  parseOpen(node: XformNode): void {
    switch (node.name) {
      case "sst":
        this.model = [];
        break;
      case "si":
        this.text = [];
        this.inText = false;
        this.phoneticDepth = 0;
        break;
      case "rPh":
        this.phoneticDepth++;
        break;
      case "t":
        this.inText = this.phoneticDepth === 0;
        break;
    }
  }

  parseText(text: string): void {
    if (this.inText) {
      this.text.push(text);
    }
  }

  parseClose(name: string): boolean {
    switch (name) {
      case "t":
        this.inText = false;
        return true;
      case "rPh":
        this.phoneticDepth--;
        return true;
      case "si":
        this.model.push(this.text.join(""));
        this.text = [];
        return true;
      case "sst":
        return false;
      default:
        return true;
    }
  }
}

export { SharedStringsXform };
