export { PathBuilder, type PathBuilderOptions } from "./pathBuilder.js";
export { toPathData, toSvgDocument, type Drawable, type SvgDocumentOptions } from "./toSvg.js";
