export { ArtifactWriter, resolveArtifactFilename } from './artifact-writer'
export type { Artifact } from './artifact-writer'
