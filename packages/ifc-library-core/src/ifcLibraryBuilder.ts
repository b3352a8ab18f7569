// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import {
    Logger,
    errorMessage,
    parseThickness,
    type IReconciledAssembly,
    type IReconciledComponent,
} from "elca-core";
import { IfcGuidRegistry } from "./ifcGuid";
import { IfcStepWriter, refList, toIfcReal } from "./ifcStepWriter";
import { quote } from "./stepString";

export interface IIfcLibraryProvenance {
    organization: string;
    applicationName: string;
    applicationIdentifier: string;
    applicationVersion: string;
    personFamilyName: string;
    personGivenName: string;
}

export const DEFAULT_PROVENANCE: IIfcLibraryProvenance = {
    organization: "eLCA Material Library Creator",
    applicationName: "eLCA Material Library Creator",
    applicationIdentifier: "eLCA_Creator",
    applicationVersion: "1.0",
    personFamilyName: "User",
    personGivenName: "Default",
};

export interface IIfcLibraryOptions {
    /** Name of the `IfcLibraryInformation`, usually the source dataset. */
    libraryName: string;
    libraryVersion?: string;
    projectName?: string;
    provenance?: Partial<IIfcLibraryProvenance>;
    fileName?: string;
    timestamp?: Date;
    guids?: IfcGuidRegistry;
}

export interface ICreatedLayer {
    name: string;
    material: string;
    thickness: number;
}

export interface ICreatedLayerSet {
    name: string;
    layerSetRef: string;
    usageRef: string;
    associationGuid: string;
    layers: ICreatedLayer[];
}

export interface IAssemblyFailure {
    index: number;
    assembly: string;
    error: string;
}

export interface IIfcLibraryResult {
    content: string;
    projectGuid: string;
    layerSets: ICreatedLayerSet[];
    failures: IAssemblyFailure[];
    stats: {
        entityCount: number;
        guidCount: number;
    };
}

export interface IProvenanceRefs {
    organization: string;
    ownerHistory: string;
}

export class IfcLibraryBuildError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "IfcLibraryBuildError";
    }
}

export class IfcLibraryBuilder {
    static build(assemblies: readonly IReconciledAssembly[], options: IIfcLibraryOptions): IIfcLibraryResult {
        const writer = new IfcStepWriter();
        const guids = options.guids ?? new IfcGuidRegistry();
        const provenance = { ...DEFAULT_PROVENANCE, ...options.provenance };
        const timestamp = options.timestamp ?? new Date();

        const refs = writeProvenance(writer, provenance, timestamp);
        const lengthUnit = writer.entity("IFCSIUNIT", ["*", ".LENGTHUNIT.", "$", ".METRE."]);
        const units = writer.entity("IFCUNITASSIGNMENT", [refList([lengthUnit])]);

        const projectGuid = guids.next();
        writer.entity("IFCPROJECT", [
            quote(projectGuid),
            refs.ownerHistory,
            quote(options.projectName ?? "eLCA Material Library"),
            "$",
            "$",
            "$",
            "$",
            "$",
            units,
        ]);

        const library = writer.entity("IFCLIBRARYINFORMATION", [
            quote(options.libraryName),
            quote(options.libraryVersion ?? "1.0"),
            refs.organization,
            "$",
            "$",
            "$",
        ]);

        const layerSets: ICreatedLayerSet[] = [];
        const failures: IAssemblyFailure[] = [];

        assemblies.forEach((assembly, index) => {
            const mark = writer.mark();
            try {
                layerSets.push(writeAssembly(writer, guids, assembly, refs.ownerHistory, library));
            } catch (e) {
                writer.rollback(mark);
                const error = errorMessage(e);
                failures.push({ index, assembly: assembly.name, error });
                Logger.error(`Skipping assembly '${assembly.name}' (#${index + 1}): ${error}`);
            }
        });

        const header = IfcStepWriter.header({
            fileName: options.fileName ?? `${options.libraryName}.ifc`,
            author: `${provenance.personGivenName} ${provenance.personFamilyName}`,
            organization: provenance.organization,
            application: provenance.applicationName,
            timestamp,
        });

        return {
            content: IfcStepWriter.document(header, writer.lines),
            projectGuid,
            layerSets,
            failures,
            stats: {
                entityCount: writer.entityCount,
                guidCount: guids.size,
            },
        };
    }
}

/**
 * Writes person, organization, application and owner history. Every entity
 * that needs an owner history references the returned instance.
 */
export function writeProvenance(
    writer: IfcStepWriter,
    provenance: IIfcLibraryProvenance,
    timestamp: Date,
): IProvenanceRefs {
    const person = writer.entity("IFCPERSON", [
        "$",
        quote(provenance.personFamilyName),
        quote(provenance.personGivenName),
        "$",
        "$",
        "$",
        "$",
        "$",
    ]);
    const organization = writer.entity("IFCORGANIZATION", ["$", quote(provenance.organization), "$", "$", "$"]);
    const personAndOrganization = writer.entity("IFCPERSONANDORGANIZATION", [person, organization, "$"]);
    const application = writer.entity("IFCAPPLICATION", [
        organization,
        quote(provenance.applicationVersion),
        quote(provenance.applicationName),
        quote(provenance.applicationIdentifier),
    ]);
    const ownerHistory = writer.entity("IFCOWNERHISTORY", [
        personAndOrganization,
        application,
        "$",
        ".ADDED.",
        "$",
        "$",
        "$",
        `${Math.floor(timestamp.getTime() / 1000)}`,
    ]);

    return { organization, ownerHistory };
}

/**
 * Thickness in metres: the value reconciled from the project export when
 * present, otherwise the report's quantity text.
 */
export function layerThickness(component: IReconciledComponent): number {
    if (component.thickness === undefined) {
        return parseThickness(component.quantity);
    }
    if (!Number.isFinite(component.thickness) || component.thickness < 0) {
        throw new IfcLibraryBuildError(
            `Invalid layer thickness ${component.thickness} for component '${component.name ?? component.number ?? "?"}'`,
        );
    }
    return component.thickness;
}

function writeAssembly(
    writer: IfcStepWriter,
    guids: IfcGuidRegistry,
    assembly: IReconciledAssembly,
    ownerHistory: string,
    library: string,
): ICreatedLayerSet {
    const layers: ICreatedLayer[] = [];
    const layerRefs: string[] = [];

    assembly.components.forEach((component, index) => {
        const name = component.name ?? `Component ${index + 1}`;
        const thickness = layerThickness(component);

        const material = writer.entity("IFCMATERIAL", [quote(name), "$", quote(component.category)]);
        layerRefs.push(
            writer.entity("IFCMATERIALLAYER", [material, toIfcReal(thickness), "$", quote(name), "$", "$", "$"]),
        );
        layers.push({ name, material: name, thickness });
    });

    const description = [assembly.categoryCode, assembly.categoryName].filter((x) => x.length > 0).join(" ");
    const layerSet = writer.entity("IFCMATERIALLAYERSET", [
        refList(layerRefs),
        quote(assembly.name),
        description.length > 0 ? quote(description) : "$",
    ]);
    const usage = writer.entity("IFCMATERIALLAYERSETUSAGE", [layerSet, ".AXIS3.", ".POSITIVE.", "0.", "$"]);

    const associationGuid = guids.next();
    writer.entity("IFCRELASSOCIATESLIBRARY", [
        quote(associationGuid),
        ownerHistory,
        quote(`Association ${assembly.name}`),
        quote(`Association to library for ${assembly.name}`),
        refList([layerSet]),
        library,
    ]);

    return { name: assembly.name, layerSetRef: layerSet, usageRef: usage, associationGuid, layers };
}
