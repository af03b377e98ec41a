import { BaseNode, NodeKind, SourceLocation } from "../types";
import { DeclarationList } from "../declarations";
import { StatementList } from "./StatementList";

/**
 * Root of a parsed program. It is tagged as a block whose two children are
 * the declaration section and the statement section.
 */
export class Program implements BaseNode {
    readonly kind: NodeKind.Block = NodeKind.Block;
    readonly text = "";

    constructor(
        public readonly declarations: DeclarationList,
        public readonly statements: StatementList,
        public loc: SourceLocation,
    ) {}

    get children(): readonly [DeclarationList, StatementList] {
        return [this.declarations, this.statements];
    }
}
