import { BaseXform, type XformNode } from "../base-xform.js";

export interface Relationship {
  Id: string;
  Type: string;
  Target: string;
  TargetMode?: string;
}

/** `.rels` parts: `<Relationships><Relationship Id Type Target/>…` */
class RelationshipsXform extends BaseXform<Relationship[]> {
  constructor() {
    super([]);
  }

  parseOpen(node: XformNode): void {
    switch (node.name) {
      case "Relationships":
        this.model = [];
        break;
      case "Relationship": {
        const { Id, Type, Target, TargetMode } = node.attributes;
        if (Id !== undefined && Target !== undefined) {
          const rel: Relationship = { Id, Type: Type ?? "", Target };
          if (TargetMode !== undefined) {
            rel.TargetMode = TargetMode;
          }
          this.model.push(rel);
        }
        break;
      }
    }
  }

  parseClose(name: string): boolean {
    switch (name) {
      case "Relationships":
        return false;
      default:
        return true;
    }
  }
}

export { RelationshipsXform };
