// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { IFC_LIBRARY_SCHEMA } from "./ifcLibraryDocument";
import { encodeStepString } from "./stepString";

export interface IStepHeader {
    fileName: string;
    author: string;
    organization: string;
    application: string;
    timestamp?: Date;
    schema?: string;
}

export interface IStepMark {
    readonly id: number;
    readonly lineCount: number;
}

export class IfcStepWriter {
    private _id: number;
    readonly lines: string[] = [];

    constructor(firstId = 1) {
        this._id = firstId;
    }

    entity(type: string, args: string[]): string {
        const ref = `#${this._id++}`;
        this.lines.push(`${ref}=${type}(${args.join(",")});`);
        return ref;
    }

    mark(): IStepMark {
        return { id: this._id, lineCount: this.lines.length };
    }

    rollback(mark: IStepMark) {
        this._id = mark.id;
        this.lines.length = mark.lineCount;
    }

    get entityCount() {
        return this.lines.length;
    }

    static header(header: IStepHeader): string {
        const schema = header.schema ?? IFC_LIBRARY_SCHEMA;
        const timestamp = (header.timestamp ?? new Date()).toISOString().split(".")[0];
        return [
            "HEADER;",
            `FILE_DESCRIPTION(('ViewDefinition [ReferenceView]'),'2;1');`,
            `FILE_NAME('${encodeStepString(header.fileName)}','${timestamp}',('${encodeStepString(header.author)}'),('${encodeStepString(header.organization)}'),'${encodeStepString(header.application)}','${encodeStepString(header.application)}','');`,
            `FILE_SCHEMA(('${schema}'));`,
            "ENDSEC;",
        ].join("\n");
    }

    static document(header: string, lines: readonly string[]): string {
        return ["ISO-10303-21;", header, "DATA;", ...lines, "ENDSEC;", "END-ISO-10303-21;", ""].join("\n");
    }
}

export function toIfcReal(value: number): string {
    if (!Number.isFinite(value)) {
        return "0.";
    }
    const text = `${Number.parseFloat(value.toFixed(9))}`;
    return text.includes(".") || text.includes("e") ? text : `${text}.`;
}

export function refList(refs: readonly string[]): string {
    return `(${refs.join(",")})`;
}
