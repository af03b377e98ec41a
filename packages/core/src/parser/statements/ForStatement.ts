import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Expression } from "../expressions";
import { Declaration } from "../declarations";
import { AssignmentStatement } from "./AssignmentStatement";
import { Statement } from "./index";

export type ForInit = Declaration | AssignmentStatement;

/**
 * `for (init; condition; update) body`. Clauses left empty in the source are
 * `null`, so the children are always four entries long.
 */
export class ForStatement implements BaseNode {
    readonly kind: NodeKind.For = NodeKind.For;
    readonly text = "";

    constructor(
        public readonly init: ForInit | null,
        public readonly condition: Expression | null,
        public readonly update: AssignmentStatement | null,
        public readonly body: Statement,
        public loc: SourceLocation,
    ) {}

    get children(): readonly [
        ForInit | null,
        Expression | null,
        AssignmentStatement | null,
        Statement,
    ] {
        return [this.init, this.condition, this.update, this.body];
    }
}
