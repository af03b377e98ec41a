import { AssignmentStatement } from "./AssignmentStatement";
import { IfStatement } from "./IfStatement";
import { WhileStatement } from "./WhileStatement";
import { ForStatement } from "./ForStatement";
import { ReadStatement } from "./ReadStatement";
import { WriteStatement } from "./WriteStatement";
import { BlockStatement } from "./BlockStatement";

export * from "./AssignmentStatement";
export * from "./IfStatement";
export * from "./WhileStatement";
export * from "./ForStatement";
export * from "./ReadStatement";
export * from "./WriteStatement";
export * from "./BlockStatement";
export * from "./StatementList";
export * from "./Program";

export type Statement =
    | AssignmentStatement
    | IfStatement
    | WhileStatement
    | ForStatement
    | ReadStatement
    | WriteStatement
    | BlockStatement;
