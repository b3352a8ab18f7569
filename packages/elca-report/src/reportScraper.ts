// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, readFileSync } from "node:fs";
import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import {
    Logger,
    UNKNOWN_COMPONENT_CATEGORY,
    type IAssemblyRecord,
    type IComponentRecord,
    type ILifecycleProcess,
} from "elca-core";

const SELECTORS = {
    category: "ul.category > li.section",
    assembly: "ul.report-elements > li.section",
    properties: "dl.clearfix",
    componentBlock: "div.element-assets",
    componentRow: "tr.component",
    detailsRow: "tr.details",
    processRow: "table.report-assets-details tbody tr:not(.table-headlines)",
} as const;

const MIN_PROCESS_CELLS = 5;

export class ReportNotFoundError extends Error {
    constructor(readonly path: string) {
        super(`Report file not found: ${path}`);
        this.name = "ReportNotFoundError";
    }
}

interface ICategoryHeading {
    code: string;
    name: string;
    subcategory?: string;
}

/**
 * Reads the assembly/component/process tree out of an eLCA HTML report.
 * Missing nested markup never fails the parse: a category without heading or
 * an assembly without title link is skipped, other absent fields stay unset.
 */
export class ReportScraper {
    static parseFile(path: string): IAssemblyRecord[] {
        if (!existsSync(path)) {
            throw new ReportNotFoundError(path);
        }
        Logger.info(`Loading report ${path}`);
        return ReportScraper.parse(readFileSync(path, "utf-8"));
    }

    static parse(html: string): IAssemblyRecord[] {
        const $ = cheerio.load(html);
        const detailRows = new DetailRowIndex($);
        const assemblies: IAssemblyRecord[] = [];

        $(SELECTORS.category).each((_, categorySection) => {
            const heading = readCategoryHeading($(categorySection));
            if (!heading) return;

            $(categorySection)
                .find(SELECTORS.assembly)
                .each((_, assemblySection) => {
                    const assembly = readAssembly($, $(assemblySection), heading, detailRows);
                    if (assembly) assemblies.push(assembly);
                });
        });

        Logger.debug(`Found ${assemblies.length} assemblies`);
        return assemblies;
    }
}

/**
 * Text of every descendant text node, each trimmed, concatenated without separator.
 */
export function strippedText<T extends AnyNode>(nodes: Cheerio<T>): string {
    return nodes
        .toArray()
        .map((node) => collectText(node))
        .join("");
}

function collectText(node: AnyNode): string {
    if (isText(node)) return node.data.trim();
    if (isTag(node)) return node.children.map(collectText).join("");
    return "";
}

function readCategoryHeading(section: Cheerio<Element>): ICategoryHeading | undefined {
    const h1 = section.find("h1").first();
    if (h1.length === 0) return undefined;

    let text = strippedText(h1);
    let subcategory: string | undefined;

    // only the span node is removed; the same words elsewhere in the heading stay
    const span = h1.find("span").first();
    if (span.length > 0) {
        subcategory = strippedText(span);
        const withoutSpan = h1.clone();
        withoutSpan.find("span").first().remove();
        text = strippedText(withoutSpan);
    }

    const match = text.match(/^(\S+)\s+([\s\S]+)$/);
    return {
        code: match ? match[1] : text,
        name: match ? match[2] : text,
        subcategory,
    };
}

function readAssembly(
    $: CheerioAPI,
    section: Cheerio<Element>,
    heading: ICategoryHeading,
    detailRows: DetailRowIndex,
): IAssemblyRecord | undefined {
    const h2 = section.find("h2").first();
    if (h2.length === 0) return undefined;

    const link = h2.find("a.page").first();
    if (link.length === 0) return undefined;

    const assembly: IAssemblyRecord = {
        categoryCode: heading.code,
        categoryName: heading.name,
        ...(heading.subcategory !== undefined ? { subcategory: heading.subcategory } : {}),
        name: strippedText(link),
        url: link.attr("href") ?? "",
        properties: readProperties($, section),
        components: [],
    };

    section.find(SELECTORS.componentBlock).each((_, block) => {
        const h3 = $(block).find("h3").first();
        const category = h3.length > 0 ? strippedText(h3) : UNKNOWN_COMPONENT_CATEGORY;

        $(block)
            .find(SELECTORS.componentRow)
            .each((_, row) => {
                assembly.components.push(readComponent($, row, category, detailRows));
            });
    });

    return assembly;
}

/**
 * Pairs each `dt` with the next `dd` that follows it in document order.
 */
function readProperties($: CheerioAPI, section: Cheerio<Element>): Record<string, string> {
    const properties: Record<string, string> = {};
    const dl = section.find(SELECTORS.properties).first();
    if (dl.length === 0) return properties;

    const nodes = dl.find("dt, dd").toArray();
    nodes.forEach((node, index) => {
        if (node.tagName !== "dt") return;
        const dd = nodes.slice(index + 1).find((x) => x.tagName === "dd");
        if (!dd) return;
        const name = strippedText($(node)).replace(/:+$/, "");
        properties[name] = strippedText($(dd));
    });

    return properties;
}

function readComponent(
    $: CheerioAPI,
    row: Element,
    category: string,
    detailRows: DetailRowIndex,
): IComponentRecord {
    const component: IComponentRecord = { category, processes: [] };
    const cells = $(row);

    const number = optionalText(cells.find("td.firstColumn"));
    if (number !== undefined) component.number = number;

    const details = cells.find("td.lastColumn").first();
    if (details.length > 0) {
        const name = optionalText(details.find("span.process-config-name"));
        const status = optionalText(details.find("span.info-is-extant"));
        const quantity = optionalText(details.find("span.info-quantity span"));
        const lifetime = optionalText(details.find("span.info-life-time"));
        if (name !== undefined) component.name = name;
        if (status !== undefined) component.status = status;
        if (quantity !== undefined) component.quantity = quantity;
        if (lifetime !== undefined) component.lifetime = lifetime;
    }

    const detailsRow = detailRows.after(row);
    if (detailsRow) {
        component.processes = readProcesses($, detailsRow);
    }

    return component;
}

function readProcesses($: CheerioAPI, detailsRow: Element): ILifecycleProcess[] {
    const processes: ILifecycleProcess[] = [];

    $(detailsRow)
        .find(SELECTORS.processRow)
        .each((_, processRow) => {
            const cells = $(processRow)
                .find("td")
                .toArray()
                .map((x) => strippedText($(x)));
            if (cells.length < MIN_PROCESS_CELLS) return;

            processes.push({
                phase: cells[0],
                ratio: cells[1],
                processName: cells[2],
                referenceValue: cells[3],
                uuid: cells[4],
            });
        });

    return processes;
}

function optionalText(nodes: Cheerio<Element>): string | undefined {
    const first = nodes.first();
    return first.length > 0 ? strippedText(first) : undefined;
}

/**
 * Finds, for a component row, the next details row in document order. The
 * report does not link the two by any key.
 */
class DetailRowIndex {
    private readonly order = new Map<Element, number>();
    private readonly details: { position: number; row: Element }[] = [];

    constructor($: CheerioAPI) {
        $("tr")
            .toArray()
            .forEach((row, position) => {
                this.order.set(row, position);
                if ($(row).is(SELECTORS.detailsRow)) {
                    this.details.push({ position, row });
                }
            });
    }

    after(row: Element): Element | undefined {
        const position = this.order.get(row);
        if (position === undefined) return undefined;
        return this.details.find((x) => x.position > position)?.row;
    }
}
