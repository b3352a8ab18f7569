// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export const IFC_FILE_EXTENSION = ".ifc";
export const IFC_LIBRARY_SCHEMA = "IFC4";

export interface IIfcEntity {
    id: number;
    type: string;
    args: string[];
    raw: string;
}

export interface IIfcDocument {
    header: string;
    schemas: string[];
    /** Simple instances with parsed arguments. */
    entities: IIfcEntity[];
    /** Every DATA statement in file order without its `;`, comments removed. */
    statements: string[];
    /** Highest instance id in the DATA section, complex instances included. */
    maxId: number;
}

export interface IIfcMaterialLayerInfo {
    name: string;
    material: string;
    category?: string;
    /** Metres. */
    thickness: number;
}

export interface IIfcLayerSetInfo {
    id: number;
    name: string;
    description?: string;
    layers: IIfcMaterialLayerInfo[];
    library?: string;
    wallType?: string;
}
