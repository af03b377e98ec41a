import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Identifier } from "../expressions";

export class ReadStatement implements BaseNode {
    readonly kind: NodeKind.Read = NodeKind.Read;
    readonly text = "";

    constructor(
        public readonly targets: readonly Identifier[],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Identifier[] {
        return this.targets;
    }
}
