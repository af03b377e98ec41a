import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Expression } from "../expressions";
import { Statement } from "./index";

export class WhileStatement implements BaseNode {
    readonly kind: NodeKind.While = NodeKind.While;
    readonly text = "";

    constructor(
        public readonly condition: Expression,
        public readonly body: Statement,
        public loc: SourceLocation,
    ) {}

    get children(): readonly [Expression, Statement] {
        return [this.condition, this.body];
    }
}
