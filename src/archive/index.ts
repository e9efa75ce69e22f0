export { DirSource } from "./DirSource.js";
export { DirTarget } from "./DirTarget.js";
export { ZipSource } from "./ZipSource.js";
export { ZipTarget, type ZipTargetOptions } from "./ZipTarget.js";
export { withArchive, type ArchiveSource, type ArchiveTarget, type Scoped } from "./types.js";
