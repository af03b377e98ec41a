import { BaseNode, NodeKind, SourceLocation, VariableType } from "../types";
import { Expression, Identifier } from "../expressions";

export class TypeName implements BaseNode {
    readonly kind: NodeKind.TypeName = NodeKind.TypeName;
    readonly children: readonly [] = [];

    constructor(
        public readonly text: VariableType,
        public loc: SourceLocation,
    ) {}
}

export interface Declarator {
    name: Identifier;
    initializer?: Expression;
}

/**
 * One `type a, b = expr;` group. Children are flattened as
 * `[type, a, b, expr]`: each initializer directly follows its identifier.
 */
export class Declaration implements BaseNode {
    readonly kind: NodeKind.List = NodeKind.List;
    readonly text = "";

    constructor(
        public readonly type: TypeName,
        public readonly declarators: readonly Declarator[],
        public loc: SourceLocation,
    ) {}

    get children(): ReadonlyArray<TypeName | Identifier | Expression> {
        const children: Array<TypeName | Identifier | Expression> = [
            this.type,
        ];
        for (const { name, initializer } of this.declarators) {
            children.push(name);
            if (initializer) children.push(initializer);
        }
        return children;
    }
}

export class DeclarationList implements BaseNode {
    readonly kind: NodeKind.DeclarationList = NodeKind.DeclarationList;
    readonly text = "";

    constructor(
        public readonly declarations: readonly Declaration[],
        public loc: SourceLocation,
    ) {}

    get children(): readonly Declaration[] {
        return this.declarations;
    }
}
