// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export const ELCA_NAMESPACE = "https://www.bauteileditor.de";

export const UNKNOWN_COMPONENT_CATEGORY = "Unknown";

export interface ILifecycleProcess {
    phase: string;
    ratio: string;
    processName: string;
    referenceValue: string;
    uuid: string;
}

/**
 * One row of a component table in the report. Every text field is optional:
 * a missing markup element leaves the property absent rather than empty.
 */
export interface IComponentRecord {
    category: string;
    number?: string;
    name?: string;
    status?: string;
    quantity?: string;
    lifetime?: string;
    processes: ILifecycleProcess[];
    /** Linking keys into the project export; the report scraper never sets them. */
    elementUuid?: string;
    componentUuid?: string;
}

/**
 * A building element ("Bauteil"). Not unique by any key: the same
 * category/name/url may occur more than once in a report.
 */
export interface IAssemblyRecord {
    categoryCode: string;
    categoryName: string;
    subcategory?: string;
    name: string;
    url: string;
    properties: Record<string, string>;
    components: IComponentRecord[];
}

export interface IXmlElementInfo {
    uuid: string;
    name?: string;
    description?: string;
    din276Code?: string;
    quantity?: string;
    refUnit?: string;
}

export interface IXmlComponentInfo {
    uuid?: string;
    isLayer?: boolean;
    processConfigUuid?: string;
    processConfigName?: string;
    /** Layer size in millimetres as written in the export. */
    layerSize: number;
    lifeTime?: number;
    lifeTimeDelay?: number;
    calcLca?: boolean;
    isExtant?: boolean;
    layerPosition?: number;
    layerAreaRatio?: number;
    layerLength?: number;
    layerWidth?: number;
}

export interface IXmlLayerEntry {
    key: string;
    element: IXmlElementInfo;
    component: IXmlComponentInfo;
}

export type MatchKind = "key" | "name" | "assembly-and-name";

export interface IReconciledComponent extends IComponentRecord {
    /** Layer thickness in metres, only when taken from the project export. */
    thickness?: number;
    processConfigUuid?: string;
    isExtant?: boolean;
    lifeTime?: number;
    lifeTimeDelay?: number;
    calcLca?: boolean;
    layerPosition?: number;
    layerAreaRatio?: number;
    layerLength?: number;
    layerWidth?: number;
    matchedBy?: MatchKind;
}

export interface IReconciledAssembly extends Omit<IAssemblyRecord, "components"> {
    components: IReconciledComponent[];
}

export function countComponents(assemblies: readonly { components: readonly unknown[] }[]): number {
    return assemblies.reduce((sum, x) => sum + x.components.length, 0);
}
