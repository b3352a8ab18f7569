// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import {
    Logger,
    millimetresToMetres,
    type IAssemblyRecord,
    type IComponentRecord,
    type IReconciledAssembly,
    type IReconciledComponent,
    type IXmlLayerEntry,
    type MatchKind,
} from "elca-core";
import type { XmlLayerLookup } from "./xmlLayerLookup";

/**
 * `name` matches a component by its display name alone; components sharing a
 * name across assemblies then receive the same layer data.
 * `assembly-and-name` also requires the export element's name to equal the
 * assembly name.
 */
export type MatchStrategy = "name" | "assembly-and-name";

export interface IReconcileOptions {
    strategy?: MatchStrategy;
}

export class Reconciler {
    static merge(
        assemblies: readonly IAssemblyRecord[],
        lookup: XmlLayerLookup,
        options: IReconcileOptions = {},
    ): IReconciledAssembly[] {
        const strategy = options.strategy ?? "name";
        let matched = 0;

        const result = assemblies.map((assembly) => ({
            ...assembly,
            properties: { ...assembly.properties },
            components: assembly.components.map((component) => {
                const reconciled = reconcileComponent(assembly, component, lookup, strategy);
                if (reconciled.matchedBy) matched++;
                return reconciled;
            }),
        }));

        Logger.debug(`Reconciled ${matched} components with project export (${strategy})`);
        return result;
    }
}

function reconcileComponent(
    assembly: IAssemblyRecord,
    component: IComponentRecord,
    lookup: XmlLayerLookup,
    strategy: MatchStrategy,
): IReconciledComponent {
    const copy: IReconciledComponent = {
        ...component,
        processes: component.processes.map((x) => ({ ...x })),
    };

    const match = findMatch(assembly, component, lookup, strategy);
    if (!match) return copy;

    return applyEntry(copy, match.entry, match.kind);
}

function findMatch(
    assembly: IAssemblyRecord,
    component: IComponentRecord,
    lookup: XmlLayerLookup,
    strategy: MatchStrategy,
): { entry: IXmlLayerEntry; kind: MatchKind } | undefined {
    if (component.elementUuid !== undefined && component.componentUuid !== undefined) {
        const entry = lookup.getByKey(component.elementUuid, component.componentUuid);
        if (entry) return { entry, kind: "key" };
    }

    if (component.name === undefined) return undefined;

    if (strategy === "assembly-and-name") {
        // latest element of that name wins, as with plain name matching
        const entry = [...lookup.getAllByName(component.name)]
            .reverse()
            .find((x) => x.element.name === assembly.name);
        return entry ? { entry, kind: "assembly-and-name" } : undefined;
    }

    const entry = lookup.getByName(component.name);
    return entry ? { entry, kind: "name" } : undefined;
}

function applyEntry(component: IReconciledComponent, entry: IXmlLayerEntry, kind: MatchKind): IReconciledComponent {
    const xml = entry.component;
    const reconciled: IReconciledComponent = {
        ...component,
        thickness: millimetresToMetres(xml.layerSize),
        elementUuid: entry.element.uuid,
        matchedBy: kind,
    };

    if (xml.uuid !== undefined) reconciled.componentUuid = xml.uuid;
    if (xml.processConfigUuid !== undefined) reconciled.processConfigUuid = xml.processConfigUuid;
    if (xml.isExtant !== undefined) reconciled.isExtant = xml.isExtant;
    if (xml.lifeTime !== undefined) reconciled.lifeTime = xml.lifeTime;
    if (xml.lifeTimeDelay !== undefined) reconciled.lifeTimeDelay = xml.lifeTimeDelay;
    if (xml.calcLca !== undefined) reconciled.calcLca = xml.calcLca;
    if (xml.layerPosition !== undefined) reconciled.layerPosition = xml.layerPosition;
    if (xml.layerAreaRatio !== undefined) reconciled.layerAreaRatio = xml.layerAreaRatio;
    if (xml.layerLength !== undefined) reconciled.layerLength = xml.layerLength;
    if (xml.layerWidth !== undefined) reconciled.layerWidth = xml.layerWidth;

    return reconciled;
}
