// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, readFileSync } from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import {
    Logger,
    parseDecimal,
    parseFlag,
    parseInteger,
    type IXmlComponentInfo,
    type IXmlElementInfo,
} from "elca-core";
import { XmlLayerLookup } from "./xmlLayerLookup";

const ATTRIBUTE_PREFIX = "@_";

type XmlRecord = { [key: string]: unknown };

export class ProjectXmlError extends Error {
    constructor(
        message: string,
        readonly line?: number,
        readonly column?: number,
    ) {
        super(line === undefined ? message : `${message} (line ${line}, column ${column ?? 0})`);
        this.name = "ProjectXmlError";
    }
}

/**
 * Reads layer sizes and component metadata from an eLCA project export
 * (namespace https://www.bauteileditor.de). Namespace prefixes are dropped,
 * so prefixed and default-namespace documents read the same.
 */
export class ProjectXmlReader {
    static parseFile(path: string): XmlLayerLookup {
        if (!existsSync(path)) {
            throw new ProjectXmlError(`Project XML file not found: ${path}`);
        }
        Logger.info(`Loading project export ${path}`);
        return ProjectXmlReader.parse(readFileSync(path, "utf-8"));
    }

    static parse(xml: string): XmlLayerLookup {
        const validation = XMLValidator.validate(xml);
        if (validation !== true) {
            throw new ProjectXmlError(
                `Malformed project XML: ${validation.err.msg}`,
                validation.err.line,
                validation.err.col,
            );
        }

        const parser = new XMLParser({
            ignoreAttributes: false,
            attributeNamePrefix: ATTRIBUTE_PREFIX,
            removeNSPrefix: true,
            parseAttributeValue: false,
            parseTagValue: false,
        });
        const doc: unknown = parser.parse(xml);

        const lookup = new XmlLayerLookup();
        for (const element of findAll(doc, "element")) {
            readElement(element, lookup);
        }

        Logger.debug(`Read ${lookup.size} layer entries, skipped ${lookup.skipped.length}`);
        return lookup;
    }
}

function readElement(element: XmlRecord, lookup: XmlLayerLookup) {
    const uuid = attribute(element, "uuid");
    if (!uuid) {
        Logger.debug("Skipping element without uuid");
        return;
    }

    const info = firstRecord(element.elementInfo);
    const elementInfo: IXmlElementInfo = {
        uuid,
        name: info ? textOf(info.name) : undefined,
        description: info ? textOf(info.description) : undefined,
        din276Code: attribute(element, "din276Code"),
        quantity: attribute(element, "quantity"),
        refUnit: attribute(element, "refUnit"),
    };

    findAll(element, "component").forEach((component, index) => {
        const componentUuid = attribute(component, "uuid");
        const name = attribute(component, "processConfigName");
        const label = componentUuid ?? name ?? `component-${index}`;

        const rawLayerSize = attribute(component, "layerSize");
        const layerSize = parseDecimal(rawLayerSize);
        if (layerSize === undefined) {
            Logger.warn(`Skipping component ${label} of element ${uuid}: layerSize '${rawLayerSize ?? ""}' is not a number`);
            lookup.skip({
                elementUuid: uuid,
                component: label,
                ...(rawLayerSize !== undefined ? { layerSize: rawLayerSize } : {}),
                reason: rawLayerSize === undefined ? "missing layerSize" : "invalid layerSize",
            });
            return;
        }

        const componentInfo: IXmlComponentInfo = {
            uuid: componentUuid,
            isLayer: parseFlag(attribute(component, "isLayer")),
            processConfigUuid: attribute(component, "processConfigUuid"),
            processConfigName: name,
            layerSize,
            lifeTime: parseInteger(attribute(component, "lifeTime")),
            lifeTimeDelay: parseInteger(attribute(component, "lifeTimeDelay")),
            calcLca: parseFlag(attribute(component, "calcLca")),
            isExtant: parseFlag(attribute(component, "isExtant")),
            layerPosition: parseInteger(attribute(component, "layerPosition")),
            layerAreaRatio: parseDecimal(attribute(component, "layerAreaRatio")),
            layerLength: parseDecimal(attribute(component, "layerLength")),
            layerWidth: parseDecimal(attribute(component, "layerWidth")),
        };

        lookup.add(
            {
                key: XmlLayerLookup.compositeKey(uuid, label),
                element: elementInfo,
                component: componentInfo,
            },
            name,
        );
    });
}

function isRecord(value: unknown): value is XmlRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Every record stored under `tag` at any depth below `node`, in document order.
 */
function findAll(node: unknown, tag: string): XmlRecord[] {
    const found: XmlRecord[] = [];

    const visit = (value: unknown, key: string | undefined) => {
        if (Array.isArray(value)) {
            for (const item of value) visit(item, key);
            return;
        }
        if (!isRecord(value)) return;
        if (key === tag) found.push(value);
        for (const [childKey, child] of Object.entries(value)) {
            if (!childKey.startsWith(ATTRIBUTE_PREFIX)) visit(child, childKey);
        }
    };

    if (isRecord(node)) {
        for (const [key, child] of Object.entries(node)) {
            if (!key.startsWith(ATTRIBUTE_PREFIX)) visit(child, key);
        }
    }
    return found;
}

function attribute(node: XmlRecord, name: string): string | undefined {
    const value = node[`${ATTRIBUTE_PREFIX}${name}`];
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return undefined;
}

function firstRecord(value: unknown): XmlRecord | undefined {
    if (Array.isArray(value)) return value.find(isRecord);
    return isRecord(value) ? value : undefined;
}

function textOf(value: unknown): string | undefined {
    const item: unknown = Array.isArray(value) ? value[0] : value;
    if (typeof item === "string") return item.trim();
    if (typeof item === "number" || typeof item === "boolean") return String(item);
    if (isRecord(item)) return textOf(item["#text"]);
    return undefined;
}
