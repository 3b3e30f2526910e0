export { Mesh, DEFAULT_LAYOUT, POSITION_LOCATION, UV_LOCATION, NORMAL_LOCATION } from "./Mesh";
export type { VertexAttribute } from "./Mesh";
export { directionalLight, surfaceToLight, lightToViewSpace } from "./Light";
export type { DirectionalLight, LightDirectionConvention } from "./Light";
export type { Material } from "./Material";
export { DEFAULT_LIGHTING, createLightingConfig } from "./LightingConfig";
export type { LightingConfig } from "./LightingConfig";
export { vertexStage, transformVertex, prepareTransforms } from "./VertexStage";
export type { Vertex, TransformSet, ViewSpaceVertex, VertexOutput, VertexShader, DrawTransforms } from "./VertexStage";
export { fragmentStage, shadeFragment, evaluateBlinnPhong } from "./LightingStage";
export type { Color, BlinnPhongTerms, LightingUniforms, FragmentShader } from "./LightingStage";
export { dispatch, dispatchVertices, dispatchFragments } from "./Dispatch";
export type { VertexBuffers } from "./Dispatch";
export { validateTransformSet } from "./validate";
export type { Renderer, DrawCall, FrameUniforms, ShadedMesh } from "./Renderer";
export { CpuRenderer } from "./CpuRenderer";
