// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export * from "./ifcGuid";
export * from "./ifcLibraryBuilder";
export * from "./ifcLibraryDocument";
export * from "./ifcLibraryImporter";
export * from "./ifcLibraryParser";
export * from "./ifcLibraryReader";
export * from "./ifcLibraryService";
export * from "./ifcStepWriter";
export * from "./stepString";
