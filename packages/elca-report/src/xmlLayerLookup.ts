// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Logger, type IXmlLayerEntry } from "elca-core";

export interface ISkippedXmlComponent {
    elementUuid: string;
    component: string;
    layerSize?: string;
    reason: string;
}

export interface INameOverwrite {
    name: string;
    previous: string;
    current: string;
}

/**
 * Layer data from a project export, keyed by `"{elementUuid}_{componentUuid}"`
 * and, redundantly, by bare component name. Name lookups follow
 * last-write-wins: a later component with the same name replaces the earlier
 * one, and every replacement is listed in {@link overwrittenNames}. The
 * replaced entries stay reachable through {@link getAllByName}.
 */
export class XmlLayerLookup {
    private readonly _byKey = new Map<string, IXmlLayerEntry>();
    private readonly _byName = new Map<string, IXmlLayerEntry[]>();
    readonly overwrittenNames: INameOverwrite[] = [];
    readonly skipped: ISkippedXmlComponent[] = [];

    static compositeKey(elementUuid: string, component: string): string {
        return `${elementUuid}_${component}`;
    }

    add(entry: IXmlLayerEntry, name?: string) {
        this._byKey.set(entry.key, entry);
        if (name === undefined || name.length === 0) return;

        const named = this._byName.get(name);
        if (!named) {
            this._byName.set(name, [entry]);
            return;
        }

        const previous = named[named.length - 1];
        this.overwrittenNames.push({ name, previous: previous.key, current: entry.key });
        Logger.debug(`Name '${name}' now maps to ${entry.key} instead of ${previous.key}`);
        named.push(entry);
    }

    skip(skipped: ISkippedXmlComponent) {
        this.skipped.push(skipped);
    }

    get(key: string): IXmlLayerEntry | undefined {
        return this._byKey.get(key) ?? this.getByName(key);
    }

    getByKey(elementUuid: string, componentUuid: string): IXmlLayerEntry | undefined {
        return this._byKey.get(XmlLayerLookup.compositeKey(elementUuid, componentUuid));
    }

    /** The last entry added under `name`. */
    getByName(name: string): IXmlLayerEntry | undefined {
        return this._byName.get(name)?.at(-1);
    }

    /** Every entry added under `name`, oldest first. */
    getAllByName(name: string): readonly IXmlLayerEntry[] {
        return this._byName.get(name) ?? [];
    }

    entries(): IXmlLayerEntry[] {
        return [...this._byKey.values()];
    }

    names(): string[] {
        return [...this._byName.keys()];
    }

    get size() {
        return this._byKey.size;
    }
}
