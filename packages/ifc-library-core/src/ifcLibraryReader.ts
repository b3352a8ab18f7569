// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger } from "elca-core";
import type { IIfcDocument, IIfcEntity, IIfcLayerSetInfo, IIfcMaterialLayerInfo } from "./ifcLibraryDocument";
import { optionalString, parseEntityReference, parseReal, parseReferenceList, unquote } from "./ifcLibraryParser";

export const IFC_MATERIAL = "IFCMATERIAL";
export const IFC_MATERIAL_LAYER = "IFCMATERIALLAYER";
export const IFC_MATERIAL_LAYER_SET = "IFCMATERIALLAYERSET";
export const IFC_MATERIAL_LAYER_SET_USAGE = "IFCMATERIALLAYERSETUSAGE";
export const IFC_REL_ASSOCIATES_LIBRARY = "IFCRELASSOCIATESLIBRARY";
export const IFC_REL_ASSOCIATES_MATERIAL = "IFCRELASSOCIATESMATERIAL";
export const IFC_LIBRARY_INFORMATION = "IFCLIBRARYINFORMATION";
export const IFC_OWNER_HISTORY = "IFCOWNERHISTORY";
export const IFC_PROJECT = "IFCPROJECT";
export const IFC_UNIT_ASSIGNMENT = "IFCUNITASSIGNMENT";
export const IFC_SI_UNIT = "IFCSIUNIT";
export const IFC_CONVERSION_BASED_UNIT = "IFCCONVERSIONBASEDUNIT";
export const IFC_MEASURE_WITH_UNIT = "IFCMEASUREWITHUNIT";

const LENGTH_UNIT = ".LENGTHUNIT.";
const SI_PREFIXES = new Map<string, number>([
    ["$", 1],
    [".KILO.", 1e3],
    [".HECTO.", 1e2],
    [".DECA.", 1e1],
    [".DECI.", 1e-1],
    [".CENTI.", 1e-2],
    [".MILLI.", 1e-3],
    [".MICRO.", 1e-6],
    [".NANO.", 1e-9],
]);

const TYPE_OBJECTS = new Set(["IFCWALLTYPE", "IFCSLABTYPE", "IFCROOFTYPE", "IFCCOVERINGTYPE"]);

export class IfcLibraryReader {
    /** Layer sets with thicknesses converted to metres. */
    static layerSets(ifc: IIfcDocument): IIfcLayerSetInfo[] {
        const byId = indexById(ifc);
        const libraries = buildLibraryMap(ifc.entities, byId);
        const typeNames = buildTypeObjectMap(ifc.entities, byId);
        const declared = IfcLibraryReader.lengthUnitScale(ifc);
        if (declared === undefined) {
            Logger.warn("Cannot read the length unit, layer thicknesses are taken as metres");
        }
        const scale = declared ?? 1;

        return ifc.entities
            .filter((x) => x.type === IFC_MATERIAL_LAYER_SET)
            .map((entity) => ({
                id: entity.id,
                name: unquote(entity.args[1] ?? ""),
                description: optionalString(entity.args[2]),
                layers: readLayers(entity, byId, scale),
                library: libraries.get(entity.id),
                wallType: typeNames.get(entity.id),
            }));
    }

    static layerSetNames(ifc: IIfcDocument): Set<string> {
        return new Set(
            ifc.entities.filter((x) => x.type === IFC_MATERIAL_LAYER_SET).map((x) => unquote(x.args[1] ?? "")),
        );
    }

    static firstOfType(ifc: IIfcDocument, type: string): IIfcEntity | undefined {
        return ifc.entities.find((x) => x.type === type);
    }

    /**
     * Metres per length unit, taken from the project's unit assignment (or the
     * first assignment in the file). A file without a length unit is read as
     * metres; `undefined` means a length unit is declared in a form this
     * reader does not follow.
     */
    static lengthUnitScale(ifc: IIfcDocument): number | undefined {
        const byId = indexById(ifc);
        const project = IfcLibraryReader.firstOfType(ifc, IFC_PROJECT);
        const projectUnits = project ? resolve(project.args[8], byId) : undefined;
        const assignment =
            projectUnits?.type === IFC_UNIT_ASSIGNMENT
                ? projectUnits
                : IfcLibraryReader.firstOfType(ifc, IFC_UNIT_ASSIGNMENT);
        if (!assignment) return 1;

        let unresolved = false;
        for (const ref of parseReferenceList(assignment.args[0] ?? "")) {
            const unit = byId.get(ref);
            if (!unit) {
                unresolved = true;
            } else if (unit.args[1]?.trim() === LENGTH_UNIT) {
                return unitScale(unit, byId);
            }
        }
        return unresolved ? undefined : 1;
    }
}

function indexById(ifc: IIfcDocument): Map<number, IIfcEntity> {
    return new Map(ifc.entities.map((x) => [x.id, x]));
}

function resolve(ref: string | undefined, byId: Map<number, IIfcEntity>): IIfcEntity | undefined {
    const id = parseEntityReference(ref ?? "");
    return id === undefined ? undefined : byId.get(id);
}

function unitScale(unit: IIfcEntity, byId: Map<number, IIfcEntity>, depth = 0): number | undefined {
    if (unit.type === IFC_SI_UNIT) {
        if (unit.args[3]?.trim() !== ".METRE.") return undefined;
        return SI_PREFIXES.get(unit.args[2]?.trim() ?? "$");
    }
    if (unit.type !== IFC_CONVERSION_BASED_UNIT || depth > 3) return undefined;

    // IfcMeasureWithUnit(ValueComponent, UnitComponent)
    const factor = resolve(unit.args[3], byId);
    if (factor?.type !== IFC_MEASURE_WITH_UNIT) return undefined;
    const value = parseReal(factor.args[0]);
    const base = resolve(factor.args[1], byId);
    const baseScale = base ? unitScale(base, byId, depth + 1) : undefined;
    return value === undefined || baseScale === undefined ? undefined : roundLength(value * baseScale);
}

function roundLength(value: number): number {
    return Number.parseFloat(value.toPrecision(12));
}

function readLayers(layerSet: IIfcEntity, byId: Map<number, IIfcEntity>, scale: number): IIfcMaterialLayerInfo[] {
    const layers: IIfcMaterialLayerInfo[] = [];

    for (const ref of parseReferenceList(layerSet.args[0] ?? "")) {
        const layer = byId.get(ref);
        if (!layer || layer.type !== IFC_MATERIAL_LAYER) continue;

        const materialRef = parseEntityReference(layer.args[0] ?? "");
        const material = materialRef === undefined ? undefined : byId.get(materialRef);
        const known = material?.type === IFC_MATERIAL ? material : undefined;
        const materialName = known ? unquote(known.args[0] ?? "") : "";
        const category = known ? optionalString(known.args[2]) : undefined;

        layers.push({
            name: optionalString(layer.args[3]) ?? materialName,
            material: materialName,
            ...(category !== undefined ? { category } : {}),
            thickness: roundLength((parseReal(layer.args[1]) ?? 0) * scale),
        });
    }

    return layers;
}

/**
 * Resolves a material reference to the layer set it stands for: either the
 * set itself or the set behind an `IfcMaterialLayerSetUsage`.
 */
function resolveLayerSet(ref: number, byId: Map<number, IIfcEntity>): number | undefined {
    const entity = byId.get(ref);
    if (!entity) return undefined;
    if (entity.type === IFC_MATERIAL_LAYER_SET) return entity.id;
    if (entity.type === IFC_MATERIAL_LAYER_SET_USAGE) {
        const setRef = parseEntityReference(entity.args[0] ?? "");
        return setRef === undefined ? undefined : resolveLayerSet(setRef, byId);
    }
    return undefined;
}

function buildLibraryMap(entities: IIfcEntity[], byId: Map<number, IIfcEntity>): Map<number, string> {
    const map = new Map<number, string>();

    for (const entity of entities) {
        if (entity.type !== IFC_REL_ASSOCIATES_LIBRARY) continue;
        const libraryRef = parseEntityReference(entity.args[5] ?? "");
        const library = libraryRef === undefined ? undefined : byId.get(libraryRef);
        if (!library || library.type !== IFC_LIBRARY_INFORMATION) continue;

        for (const ref of parseReferenceList(entity.args[4] ?? "")) {
            const setId = resolveLayerSet(ref, byId);
            if (setId !== undefined) map.set(setId, unquote(library.args[0] ?? ""));
        }
    }

    return map;
}

function buildTypeObjectMap(entities: IIfcEntity[], byId: Map<number, IIfcEntity>): Map<number, string> {
    const map = new Map<number, string>();

    for (const entity of entities) {
        if (entity.type !== IFC_REL_ASSOCIATES_MATERIAL) continue;
        const materialRef = parseEntityReference(entity.args[5] ?? "");
        const setId = materialRef === undefined ? undefined : resolveLayerSet(materialRef, byId);
        if (setId === undefined) continue;

        const typeObject = parseReferenceList(entity.args[4] ?? "")
            .map((ref) => byId.get(ref))
            .find((x) => x !== undefined && TYPE_OBJECTS.has(x.type));
        if (typeObject) map.set(setId, unquote(typeObject.args[2] ?? ""));
    }

    return map;
}
