import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Statement } from "./index";

export class BlockStatement implements BaseNode {
    readonly kind: NodeKind.Block = NodeKind.Block;
    readonly text = "";

    constructor(
        public readonly statements: readonly Statement[],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Statement[] {
        return this.statements;
    }
}
