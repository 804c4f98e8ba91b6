/**
 * Static fixture models for tests.
 *
 * Import directly. No side effects, no file I/O.
 */

import { Type } from "@sinclair/typebox";
import { BaseModel, NON_MODEL, type ModelIssue } from "ledgertools/models";
import type { ModelClass, ModelModule } from "ledgertools";

// =============================================================================
// Model fixtures
// =============================================================================

/** Model exercising every field kind. `Count: 13` fails its cross-field check. */
export class Widget extends BaseModel {
    static readonly description = "A test widget.";
    static readonly schema = Type.Object(
        {
            WidgetName: Type.String({ minLength: 1, description: "Display name." }),
            Count: Type.Integer({ description: "How many." }),
            Amount: Type.Optional(Type.String({ description: "Unit amount." })),
            Enabled: Type.Optional(Type.Boolean()),
            Mode: Type.Optional(Type.Union([Type.Literal("fast"), Type.Literal("slow")])),
            Ratio: Type.Optional(Type.Number()),
            Tags: Type.Optional(Type.Array(Type.String())),
            Extra: Type.Optional(Type.Unknown()),
        },
        { title: "Widget" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Widget.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.int("Count") === 13) {
            return [{ path: "/Count", message: "Count must not be 13" }];
        }
        return [];
    }
}

/** Model with a nested model field and an optional-with-default field. */
export class Gadget extends BaseModel {
    static readonly schema = Type.Object(
        {
            Label: Type.String(),
            Part: Type.Object(
                {
                    PartName: Type.String(),
                    Weight: Type.Optional(Type.Number()),
                },
                { title: "Part" },
            ),
            Level: Type.Integer({ default: 1 }),
        },
        { title: "Gadget" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Gadget.schema, fields);
    }
}

/** Abstract base carrying its own non-model marker. */
export abstract class AbstractWidget extends BaseModel {
    static readonly [NON_MODEL] = true;
}

/** Concrete subclass of a marked base: the marker is not inherited. */
export class SubWidget extends AbstractWidget {
    static readonly schema = Type.Object({ Size: Type.Integer() }, { title: "SubWidget" });

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(SubWidget.schema, fields);
    }
}

/** Constructor throws a non-Error value. */
export class ThrowingModel extends BaseModel {
    static readonly schema = Type.Object({ Input: Type.String() }, { title: "ThrowingModel" });

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(ThrowingModel.schema, fields);
        throw "boom";
    }
}

// -----------------------------------------------------------------------------
// Malformed models
// -----------------------------------------------------------------------------

export class NoSchemaModel extends BaseModel {
    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Type.Object({}), fields);
    }
}

export class StringSchemaModel extends BaseModel {
    static readonly schema = Type.String();

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Type.Object({}), fields);
    }
}

export class EmptyModel extends BaseModel {
    static readonly schema = Type.Object({});

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(EmptyModel.schema, fields);
    }
}

export class CollidingModel extends BaseModel {
    static readonly schema = Type.Object({ DestTag: Type.Integer(), dest_tag: Type.Integer() });

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(CollidingModel.schema, fields);
    }
}

/** A distinct class that is also titled `Widget`. */
export function makeDuplicateWidget(): ModelClass {
    return class Widget extends BaseModel {
        static readonly schema = Type.Object({ Label: Type.String() }, { title: "Widget" });

        constructor(fields: Readonly<Record<string, unknown>>) {
            super(Widget.schema, fields);
        }
    };
}

/**
 * A class whose name was shortened the way a minifier leaves it; only its
 * schema title says `Sprocket`. Rejects `Label: "bad"`.
 */
export function makeShortNamedSprocket(): ModelClass {
    return class A extends BaseModel {
        static readonly schema = Type.Object({ Label: Type.String() }, { title: "Sprocket" });

        constructor(fields: Readonly<Record<string, unknown>>) {
            super(A.schema, fields);
        }

        protected override getErrors(): ModelIssue[] {
            return this.text("Label") === "bad" ? [{ path: "/Label", message: "Label must not be bad" }] : [];
        }
    };
}

// =============================================================================
// Module fixtures
// =============================================================================

export enum WidgetFlag {
    Shiny = 1,
}

/** Helper function export, not a model. */
export function widgetHelper(): string {
    return "helper";
}

/** A module mixing models with exports that must be skipped. */
export const fixtureModule: ModelModule = {
    category: "widgets",
    label: "Widgets",
    exports: {
        Widget,
        WidgetAlias: Widget,
        Gadget,
        AbstractWidget,
        SubWidget,
        _HiddenWidget: makeDuplicateWidget(),
        WidgetInterface: makeDuplicateWidget(),
        WidgetFlag,
        widgetHelper,
        answer: 42,
    },
};

/** A module whose models cannot be turned into tools, plus one that can. */
export const brokenModule: ModelModule = {
    category: "broken",
    exports: { NoSchemaModel, EmptyModel, CollidingModel, ThrowingModel },
};
