import { BaseNode, NodeKind, SourceLocation } from "../types";
import { Expression, Identifier } from "../expressions";

export const ASSIGNMENT_OPERATORS = [
    "=",
    "+=",
    "-=",
    "*=",
    "/=",
    "++",
    "--",
] as const;

export type AssignmentOperator = (typeof ASSIGNMENT_OPERATORS)[number];

export function isAssignmentOperator(text: string): text is AssignmentOperator {
    const operators: readonly string[] = ASSIGNMENT_OPERATORS;
    return operators.includes(text);
}

/**
 * `x op value` or `x++` / `x--`. The operator is the node's text; `value` is
 * absent for the increment forms.
 */
export class AssignmentStatement implements BaseNode {
    readonly kind: NodeKind.Assignment = NodeKind.Assignment;

    constructor(
        public readonly text: AssignmentOperator,
        public readonly target: Identifier,
        public readonly value: Expression | undefined,
        public loc: SourceLocation,
    ) {}

    get children(): ReadonlyArray<Identifier | Expression> {
        return this.value ? [this.target, this.value] : [this.target];
    }
}
