import { BaseNode, NodeKind, SourceLocation } from "../types";

export class Identifier implements BaseNode {
    readonly kind: NodeKind.Identifier = NodeKind.Identifier;
    readonly children: readonly [] = [];

    constructor(
        public readonly text: string,
        public loc: SourceLocation,
    ) {}
}

export class IntLiteral implements BaseNode {
    readonly kind: NodeKind.IntLiteral = NodeKind.IntLiteral;
    readonly children: readonly [] = [];

    constructor(
        public readonly text: string,
        public loc: SourceLocation,
    ) {}
}

export class FloatLiteral implements BaseNode {
    readonly kind: NodeKind.FloatLiteral = NodeKind.FloatLiteral;
    readonly children: readonly [] = [];

    constructor(
        public readonly text: string,
        public loc: SourceLocation,
    ) {}
}

export class BoolLiteral implements BaseNode {
    readonly kind: NodeKind.BoolLiteral = NodeKind.BoolLiteral;
    readonly children: readonly [] = [];

    constructor(
        public readonly text: string,
        public loc: SourceLocation,
    ) {}
}

export type Operand =
    | OperatorNode
    | Identifier
    | IntLiteral
    | FloatLiteral
    | BoolLiteral;

/**
 * An applied operator. Unary operators (`!`, `~`, `++`, `--` and `neg` for
 * negation) hold one operand, binary ones hold `[left, right]`.
 */
export class OperatorNode implements BaseNode {
    readonly kind: NodeKind.Operator = NodeKind.Operator;

    constructor(
        public readonly text: string,
        public readonly operands: readonly [Operand] | readonly [Operand, Operand],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Operand[] {
        return this.operands;
    }
}

export class ExpressionNode implements BaseNode {
    readonly kind: NodeKind.Expression = NodeKind.Expression;
    readonly text = "";

    constructor(
        public readonly root: Operand,
        public loc: SourceLocation,
    ) {}

    get children(): readonly [Operand] {
        return [this.root];
    }
}

export class BooleanExpressionNode implements BaseNode {
    readonly kind: NodeKind.BooleanExpression = NodeKind.BooleanExpression;
    readonly text = "";

    constructor(
        public readonly root: OperatorNode,
        public loc: SourceLocation,
    ) {}

    get children(): readonly [OperatorNode] {
        return [this.root];
    }
}

/** Whatever the parser accepts where a condition or initializer goes. */
export type Expression = ExpressionNode | BooleanExpressionNode;
