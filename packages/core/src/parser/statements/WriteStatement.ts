import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Identifier } from "../expressions";

export class WriteStatement implements BaseNode {
    readonly kind: NodeKind.Write = NodeKind.Write;
    readonly text = "";

    constructor(
        public readonly values: readonly Identifier[],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Identifier[] {
        return this.values;
    }
}
