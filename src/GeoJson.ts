// RFC 7946 3

import { CodecConfig, defaultCodecConfig } from "./CodecConfig"
import { Feature, decodeFeatureObject, encodeFeature } from "./dataTypes/Feature"
import { FeatureCollection, decodeFeatureCollectionObject, encodeFeatureCollection } from "./dataTypes/FeatureCollection"
import { Geometry, decodeGeometryObject, encodeGeometry, geometryTypes } from "./dataTypes/Geometry"
import { errorTypes } from "./errorTypes"
import { isJsonObject, JsonObject, JsonValue, parseJson, stringifyJson } from "./json"
import { describeValue } from "./util"


export type GeoJson = Geometry | Feature | FeatureCollection


export function decodeGeoJson(value: JsonValue): GeoJson {

    if (!isJsonObject(value)) {
        throw errorTypes.ExpectedObject.withDetail("Found: " + describeValue(value))
    }

    const type = value.get("type")

    // NOTE: Strict comparison, so that e.g. ["Feature"] is not taken for "Feature":
    if (type === "Feature") {
        return decodeFeatureObject(value)
    }
    else if (type === "FeatureCollection") {
        return decodeFeatureCollectionObject(value)
    }
    else if (typeof (type) == "string" && geometryTypes.some(geometryType => geometryType == type)) {
        return decodeGeometryObject(value)
    }

    if (type === undefined) {
        throw errorTypes.UnknownType.withDetail("Missing member 'type'.")
    }

    throw errorTypes.UnknownType.withDetail("Found: " + describeValue(type))
}


export function parseGeoJson(text: string): GeoJson {
    return decodeGeoJson(parseJson(text))
}


export function encodeGeoJson(geoJson: GeoJson): JsonObject {

    if (geoJson instanceof Feature) {
        return encodeFeature(geoJson)
    }
    else if (geoJson instanceof FeatureCollection) {
        return encodeFeatureCollection(geoJson)
    }

    return encodeGeometry(geoJson)
}


export function stringifyGeoJson(geoJson: GeoJson, config: CodecConfig = defaultCodecConfig): string {
    return stringifyJson(encodeGeoJson(geoJson), config)
}
