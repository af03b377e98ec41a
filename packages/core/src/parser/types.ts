import {
    AssignmentStatement,
    BlockStatement,
    ForStatement,
    IfStatement,
    Program,
    ReadStatement,
    StatementList,
    WhileStatement,
    WriteStatement,
} from "./statements";
import { Declaration, DeclarationList, TypeName } from "./declarations";
import {
    BoolLiteral,
    BooleanExpressionNode,
    ExpressionNode,
    FloatLiteral,
    Identifier,
    IntLiteral,
    OperatorNode,
} from "./expressions";

export enum NodeKind {
    Expression = "Expression",
    BooleanExpression = "BooleanExpression",
    DeclarationList = "DeclarationList",
    StatementList = "StatementList",
    Assignment = "Assignment",
    If = "If",
    While = "While",
    For = "For",
    Read = "Read",
    Write = "Write",
    Block = "Block",
    Operator = "Operator",
    Identifier = "Identifier",
    IntLiteral = "IntLiteral",
    FloatLiteral = "FloatLiteral",
    BoolLiteral = "BoolLiteral",
    TypeName = "TypeName",
    List = "List",
}

export interface SourceLocation {
    line: number;
    column: number;
}

/**
 * Shape shared by every parse-tree node. `children` is in source order; a
 * `null` entry marks a clause the source left out.
 */
export interface BaseNode {
    readonly kind: NodeKind;
    readonly text: string;
    readonly children: ReadonlyArray<Node | null>;
    loc: SourceLocation;
}

export type Node =
    | ExpressionNode
    | BooleanExpressionNode
    | OperatorNode
    | Identifier
    | IntLiteral
    | FloatLiteral
    | BoolLiteral
    | DeclarationList
    | Declaration
    | TypeName
    | StatementList
    | AssignmentStatement
    | IfStatement
    | WhileStatement
    | ForStatement
    | ReadStatement
    | WriteStatement
    | BlockStatement
    | Program;

export type VariableType = "int" | "float" | "bool";
