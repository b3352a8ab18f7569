// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger } from "elca-core";
import { DEFAULT_PROVENANCE, writeProvenance, type IIfcLibraryProvenance } from "./ifcLibraryBuilder";
import { IFC_LIBRARY_SCHEMA, type IIfcDocument } from "./ifcLibraryDocument";
import { IfcGuidRegistry } from "./ifcGuid";
import { unquote } from "./ifcLibraryParser";
import { IFC_LIBRARY_INFORMATION, IFC_MATERIAL, IFC_OWNER_HISTORY, IfcLibraryReader } from "./ifcLibraryReader";
import { IfcStepWriter, refList, toIfcReal } from "./ifcStepWriter";
import { quote } from "./stepString";

export interface IIfcImportOptions {
    fileName?: string;
    provenance?: Partial<IIfcLibraryProvenance>;
    timestamp?: Date;
    guids?: IfcGuidRegistry;
}

export interface IIfcImportResult {
    content: string;
    imported: string[];
    skipped: string[];
}

export class IfcLibraryImportError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "IfcLibraryImportError";
    }
}

export class IfcLibraryImporter {
    /**
     * Copies the material layer sets of `library` into `target`. Sets whose
     * name already exists in the target are skipped; materials are reused by name.
     * Every target statement is written back unchanged and new instances are
     * numbered after the target's highest id. Thicknesses are converted to the
     * target's length unit.
     *
     * @throws IfcLibraryImportError for a target that is not IFC4 or whose
     * length unit cannot be read.
     */
    static merge(library: IIfcDocument, target: IIfcDocument, options: IIfcImportOptions = {}): IIfcImportResult {
        assertIfc4(target);
        const targetScale = IfcLibraryReader.lengthUnitScale(target);
        if (targetScale === undefined) {
            throw new IfcLibraryImportError("Cannot read the length unit of the target file");
        }

        const guids = options.guids ?? new IfcGuidRegistry();
        const timestamp = options.timestamp ?? new Date();
        const writer = new IfcStepWriter(target.maxId + 1);

        const existingNames = IfcLibraryReader.layerSetNames(target);
        const materials = new Map<string, string>();
        for (const entity of target.entities) {
            if (entity.type !== IFC_MATERIAL) continue;
            const name = unquote(entity.args[0] ?? "");
            if (!materials.has(name)) materials.set(name, `#${entity.id}`);
        }

        const imported: string[] = [];
        const skipped: string[] = [];
        let ownerHistory: string | undefined;
        let libraryRef: string | undefined;

        for (const layerSet of IfcLibraryReader.layerSets(library)) {
            if (existingNames.has(layerSet.name)) {
                Logger.info(`Material layer set '${layerSet.name}' already exists`);
                skipped.push(layerSet.name);
                continue;
            }

            ownerHistory ??= resolveOwnerHistory(target, writer, options, timestamp);
            libraryRef ??= writeLibraryInformation(library, writer);

            const layerRefs = layerSet.layers.map((layer) => {
                let material = materials.get(layer.material);
                if (!material) {
                    material = writer.entity(IFC_MATERIAL, [
                        quote(layer.material),
                        "$",
                        layer.category !== undefined ? quote(layer.category) : "$",
                    ]);
                    materials.set(layer.material, material);
                }
                return writer.entity("IFCMATERIALLAYER", [
                    material,
                    toIfcReal(layer.thickness / targetScale),
                    "$",
                    quote(layer.name),
                    "$",
                    "$",
                    "$",
                ]);
            });

            const setRef = writer.entity("IFCMATERIALLAYERSET", [
                refList(layerRefs),
                quote(layerSet.name),
                layerSet.description !== undefined ? quote(layerSet.description) : "$",
            ]);
            writer.entity("IFCMATERIALLAYERSETUSAGE", [setRef, ".AXIS3.", ".POSITIVE.", "0.", "$"]);
            writer.entity("IFCRELASSOCIATESLIBRARY", [
                quote(guids.next()),
                ownerHistory,
                quote(`Association ${layerSet.name}`),
                quote(`Association to library for ${layerSet.name}`),
                refList([setRef]),
                libraryRef,
            ]);

            existingNames.add(layerSet.name);
            imported.push(layerSet.name);
        }

        return {
            content: IfcStepWriter.document(targetHeader(target, options, timestamp), [
                ...target.statements.map((x) => `${x};`),
                ...writer.lines,
            ]),
            imported,
            skipped,
        };
    }
}

function assertIfc4(target: IIfcDocument) {
    if (target.schemas.length === 0 || target.schemas.some((x) => x.startsWith(IFC_LIBRARY_SCHEMA))) return;
    throw new IfcLibraryImportError(
        `Cannot import into a ${target.schemas.join(", ")} file, only ${IFC_LIBRARY_SCHEMA} targets are supported`,
    );
}

function resolveOwnerHistory(
    target: IIfcDocument,
    writer: IfcStepWriter,
    options: IIfcImportOptions,
    timestamp: Date,
): string {
    const existing = IfcLibraryReader.firstOfType(target, IFC_OWNER_HISTORY);
    if (existing) return `#${existing.id}`;
    return writeProvenance(writer, { ...DEFAULT_PROVENANCE, ...options.provenance }, timestamp).ownerHistory;
}

function writeLibraryInformation(library: IIfcDocument, writer: IfcStepWriter): string {
    const source = IfcLibraryReader.firstOfType(library, IFC_LIBRARY_INFORMATION);
    const name = source ? unquote(source.args[0] ?? "") : "Imported Material Library";
    const version = source ? unquote(source.args[1] ?? "") : "";
    return writer.entity(IFC_LIBRARY_INFORMATION, [quote(name), version ? quote(version) : "$", "$", "$", "$", "$"]);
}

function targetHeader(target: IIfcDocument, options: IIfcImportOptions, timestamp: Date): string {
    if (target.header.length > 0) return target.header;
    const provenance = { ...DEFAULT_PROVENANCE, ...options.provenance };
    return IfcStepWriter.header({
        fileName: options.fileName ?? "merged.ifc",
        author: `${provenance.personGivenName} ${provenance.personFamilyName}`,
        organization: provenance.organization,
        application: provenance.applicationName,
        timestamp,
        schema: target.schemas[0],
    });
}
