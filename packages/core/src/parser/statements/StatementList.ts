import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Statement } from "./index";

export class StatementList implements BaseNode {
    readonly kind: NodeKind.StatementList = NodeKind.StatementList;
    readonly text = "";

    constructor(
        public readonly statements: readonly Statement[],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Statement[] {
        return this.statements;
    }
}
