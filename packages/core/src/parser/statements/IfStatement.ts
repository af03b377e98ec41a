import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Expression } from "../expressions";
import { Statement } from "./index";

export class IfStatement implements BaseNode {
    readonly kind: NodeKind.If = NodeKind.If;
    readonly text = "";

    constructor(
        public readonly condition: Expression,
        public readonly thenBranch: Statement,
        public readonly elseBranch: Statement | undefined,
        public loc: SourceLocation,
    ) {}

    get children(): ReadonlyArray<Expression | Statement> {
        return this.elseBranch
            ? [this.condition, this.thenBranch, this.elseBranch]
            : [this.condition, this.thenBranch];
    }
}
