export type { CodecConfig } from "./CodecConfig"
export { codecConfigSchema, defaultCodecConfig, readCodecConfig, DEFAULT_CONFIG_PATH } from "./CodecConfig"
export { errorTypes } from "./errorTypes"
export type { GeoJsonErrorKind } from "./dataTypes/GeoJsonError"
export { GeoJsonError } from "./dataTypes/GeoJsonError"
export type { Id, StringId, NumberId } from "./dataTypes/Id"
export { stringId, numberId, idToJson, idEquals } from "./dataTypes/Id"
export type { GeometryValue } from "./dataTypes/Geometry"
export { Geometry, geometryTypes, decodeGeometryObject, decodeGeometryValue, encodeGeometry } from "./dataTypes/Geometry"
export { Feature, featureMembers, decodeFeatureObject, decodeFeatureValue, encodeFeature } from "./dataTypes/Feature"
export { FeatureCollection, featureCollectionMembers, decodeFeatureCollectionObject, decodeFeatureCollectionValue, encodeFeatureCollection } from "./dataTypes/FeatureCollection"
export type { GeoJson } from "./GeoJson"
export { decodeGeoJson, parseGeoJson, encodeGeoJson, stringifyGeoJson } from "./GeoJson"
export type { JsonValue, JsonObject, PlainJson } from "./json"
export { isJsonObject, isJsonNumber, jsonNumberToNumber, cloneJson, cloneJsonObject, toJsonValue, toJsonObject, toPlainJson, parseJson, stringifyJson } from "./json"
export { LosslessNumber } from "lossless-json"
export type { Bbox } from "./util"
