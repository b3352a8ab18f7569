// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { readFileSync, writeFileSync } from "node:fs";
import type { IReconciledAssembly } from "elca-core";
import { IfcLibraryBuilder, type IIfcLibraryOptions, type IIfcLibraryResult } from "./ifcLibraryBuilder";
import type { IIfcDocument, IIfcLayerSetInfo } from "./ifcLibraryDocument";
import { IfcLibraryImporter, type IIfcImportOptions, type IIfcImportResult } from "./ifcLibraryImporter";
import { IfcLibraryParser } from "./ifcLibraryParser";
import { IfcLibraryReader } from "./ifcLibraryReader";

export class IfcLibraryWriteError extends Error {
    constructor(
        readonly path: string,
        cause: unknown,
    ) {
        super(`Cannot write IFC library to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = "IfcLibraryWriteError";
    }
}

export class IfcLibraryService {
    static build(assemblies: readonly IReconciledAssembly[], options: IIfcLibraryOptions): IIfcLibraryResult {
        return IfcLibraryBuilder.build(assemblies, options);
    }

    static readText(path: string): string {
        return readFileSync(path, "utf-8");
    }

    static read(path: string): IIfcDocument {
        return IfcLibraryParser.parse(IfcLibraryService.readText(path));
    }

    static write(path: string, content: string) {
        try {
            writeFileSync(path, content, "utf-8");
        } catch (e) {
            throw new IfcLibraryWriteError(path, e);
        }
    }

    static layerSets(text: string): IIfcLayerSetInfo[] {
        return IfcLibraryReader.layerSets(IfcLibraryParser.parse(text));
    }

    static merge(libraryText: string, targetText: string, options?: IIfcImportOptions): IIfcImportResult {
        return IfcLibraryImporter.merge(IfcLibraryParser.parse(libraryText), IfcLibraryParser.parse(targetText), options);
    }
}
