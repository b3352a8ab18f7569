// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger } from "elca-core";
import type { IIfcDocument } from "./ifcLibraryDocument";
import { decodeStepString } from "./stepString";

const INSTANCE_NAME = /^#(\d+)\s*=\s*([\s\S]*)$/;
const SIMPLE_RECORD = /^([A-Z][A-Z0-9_]*)\s*\(([\s\S]*)\)$/i;
const FILE_SCHEMA = /^FILE_SCHEMA\s*\(([\s\S]*)\)$/i;
const DATA_SECTION = /^DATA\s*(\([\s\S]*\))?$/i;

type Section = "none" | "header" | "data";

/**
 * Reads an ISO 10303-21 exchange file. Simple instances become entities with
 * split arguments; every DATA statement, complex instances included, is also
 * kept verbatim in `statements` so a document can be written back unchanged.
 */
export class IfcLibraryParser {
    static parse(text: string): IIfcDocument {
        const document: IIfcDocument = { header: "", schemas: [], entities: [], statements: [], maxId: 0 };
        const headerStatements: string[] = [];
        let section: Section = "none";

        for (const statement of scanStatements(text)) {
            const keyword = statement.toUpperCase();
            if (keyword === "HEADER") {
                section = "header";
            } else if (DATA_SECTION.test(statement)) {
                section = "data";
            } else if (keyword === "ENDSEC") {
                section = "none";
            } else if (section === "header") {
                headerStatements.push(statement);
            } else if (section === "data") {
                readInstance(statement, document);
            }
        }

        if (headerStatements.length > 0) {
            document.header = ["HEADER;", ...headerStatements.map((x) => `${x};`), "ENDSEC;"].join("\n");
            document.schemas = readSchemas(headerStatements);
        }
        return document;
    }
}

function readInstance(statement: string, document: IIfcDocument) {
    document.statements.push(statement);

    const named = statement.match(INSTANCE_NAME);
    if (!named) {
        Logger.warn(`DATA statement without instance name: ${statement.slice(0, 40)}`);
        return;
    }

    const id = Number.parseInt(named[1], 10);
    document.maxId = Math.max(document.maxId, id);

    // complex instances `(A(..) B(..))` stay statement-only
    const record = named[2].match(SIMPLE_RECORD);
    if (!record) return;

    document.entities.push({
        id,
        type: record[1].toUpperCase(),
        args: splitTopLevel(record[2]),
        raw: statement,
    });
}

function readSchemas(headerStatements: readonly string[]): string[] {
    for (const statement of headerStatements) {
        const match = statement.match(FILE_SCHEMA);
        if (!match) continue;
        const [list] = splitTopLevel(match[1]);
        return list ? listItems(list).map((x) => unquote(x).toUpperCase()) : [];
    }
    return [];
}

/**
 * Splits exchange-file text on `;`, dropping `/* *\/` comments. Quotes
 * inside comments and semicolons inside strings are ignored.
 */
function scanStatements(text: string): string[] {
    const statements: string[] = [];
    let current = "";
    let i = 0;

    const flush = () => {
        const statement = current.trim();
        if (statement.length > 0) statements.push(statement);
        current = "";
    };

    while (i < text.length) {
        const ch = text[i];
        if (ch === "'") {
            const end = stringEnd(text, i);
            current += text.slice(i, end);
            i = end;
        } else if (ch === "/" && text[i + 1] === "*") {
            const close = text.indexOf("*/", i + 2);
            i = close < 0 ? text.length : close + 2;
        } else {
            if (ch === ";") flush();
            else current += ch;
            i++;
        }
    }
    flush();

    return statements;
}

/** Index just past the string literal opening at `start`; `''` is an escaped quote. */
function stringEnd(text: string, start: number): number {
    let i = start + 1;
    while (i < text.length) {
        if (text[i] !== "'") {
            i++;
        } else if (text[i + 1] === "'") {
            i += 2;
        } else {
            return i + 1;
        }
    }
    return text.length;
}

export function splitTopLevel(value: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let start = 0;
    let i = 0;

    while (i < value.length) {
        const ch = value[i];
        if (ch === "'") {
            i = stringEnd(value, i);
            continue;
        }
        if (ch === "(") depth++;
        else if (ch === ")") depth--;
        else if (ch === "," && depth === 0) {
            parts.push(value.slice(start, i).trim());
            start = i + 1;
        }
        i++;
    }

    const last = value.slice(start).trim();
    if (last.length > 0) parts.push(last);
    return parts;
}

/** Items of a parenthesised aggregate such as `(#1,#2)`; anything else has none. */
export function listItems(value: string): string[] {
    const trimmed = value.trim();
    if (!trimmed.startsWith("(") || !trimmed.endsWith(")")) return [];
    return splitTopLevel(trimmed.slice(1, -1));
}

export function parseEntityReference(value: string): number | undefined {
    const match = value.trim().match(/^#(\d+)$/);
    return match ? Number.parseInt(match[1], 10) : undefined;
}

export function parseReferenceList(value: string): number[] {
    return listItems(value)
        .map(parseEntityReference)
        .filter((x): x is number => x !== undefined);
}

/**
 * Numeric value of a real, also when wrapped in a type such as
 * `IFCLENGTHMEASURE(0.3048)`.
 */
export function parseReal(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const typed = value.trim().match(/^[A-Z][A-Z0-9_]*\s*\(([\s\S]*)\)$/i);
    const number = (typed ? typed[1] : value).trim();
    if (number === "$" || number.length === 0) return undefined;
    const parsed = Number.parseFloat(number);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function unquote(value: string): string {
    return optionalString(value) ?? "";
}

export function optionalString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    if (trimmed === undefined || trimmed === "$" || trimmed.length === 0) return undefined;
    if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
        return decodeStepString(trimmed.slice(1, -1));
    }
    return trimmed;
}
