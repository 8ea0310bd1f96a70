// RFC 7946 3.2

import { CodecConfig, defaultCodecConfig } from "../CodecConfig"
import { errorTypes } from "../errorTypes"
import { cloneJson, cloneJsonObject, isJsonObject, JsonObject, JsonValue, PlainJson, stringifyJson, toJsonValue, toPlainJson } from "../json"
import { Bbox, describeValue, expectType, getBbox, getForeignMembers, getId, getProperties, toMembers } from "../util"
import { encodeGeometry, Geometry, getGeometry } from "./Geometry"
import { Id, idToJson } from "./Id"


// Members with a meaning defined for Feature objects. Everything else is a foreign member.
export const featureMembers: ReadonlyArray<string> = ["type", "geometry", "properties", "id", "bbox"]


export class Feature {

    readonly type = "Feature"

    readonly geometry: Geometry | null
    readonly properties: JsonObject | null
    readonly id?: Id
    readonly bbox?: Bbox
    readonly foreignMembers?: JsonObject

    /**
     * Properties, bbox and foreign members are deep-copied: the Feature owns its values, and
     * later changes to the arguments do not reach it.
     *
     * @param geometry - null for an unlocated Feature
     * @param properties - null is kept apart from an empty object. Both encode as `{}`.
     * @param foreignMembers - additional top-level members, in their original order
     */
    constructor(geometry: Geometry | null,
        properties: JsonObject | null,
        id?: Id,
        bbox?: Bbox,
        foreignMembers?: JsonObject) {

        this.geometry = geometry
        this.properties = (properties == null) ? null : cloneJsonObject(properties)
        this.id = (id == undefined) ? undefined : { ...id }
        this.bbox = (bbox == undefined) ? undefined : [...bbox]
        this.foreignMembers = (foreignMembers == undefined) ? undefined : cloneJsonObject(foreignMembers)
    }


    static fromGeometry(geometry: Geometry): Feature {
        return new Feature(geometry, null)
    }


    static fromJsonObject(object: JsonObject): Feature {
        return decodeFeatureObject(object)
    }


    static fromJsonValue(value: JsonValue): Feature {
        return decodeFeatureValue(value)
    }


    // Counterpart of toJSON() for generic (de)serialization code
    static fromJSON(value: unknown): Feature {
        return decodeFeatureValue(toJsonValue(value))
    }


    property(key: string): JsonValue | undefined {
        return this.properties?.get(key)
    }


    containsProperty(key: string): boolean {
        return this.properties != null && this.properties.has(key)
    }


    toJsonObject(): JsonObject {
        return encodeFeature(this)
    }


    // Called by JSON.stringify(), also when the Feature is nested in a larger value
    toJSON(): PlainJson {
        return toPlainJson(encodeFeature(this))
    }


    toString(config: CodecConfig = defaultCodecConfig): string {
        return stringifyJson(encodeFeature(this), config)
    }
}


export function decodeFeatureObject(object: JsonObject): Feature {

    const members = toMembers(object)

    const type = expectType(members)

    if (type != "Feature") {
        throw errorTypes.UnknownType.withDetail(`Expected 'Feature', found '${type}'.`)
    }

    // NOTE: The order of these calls defines which error is reported first:
    const geometry = getGeometry(members)
    const properties = getProperties(members)
    const id = getId(members)
    const bbox = getBbox(members)

    return new Feature(geometry, properties, id, bbox, getForeignMembers(members))
}


export function decodeFeatureValue(value: JsonValue): Feature {

    if (!isJsonObject(value)) {
        throw errorTypes.ExpectedObject.withDetail("Found: " + describeValue(value))
    }

    return decodeFeatureObject(value)
}


export function encodeFeature(feature: Feature): JsonObject {

    const result: JsonObject = new Map()

    result.set("type", "Feature")

    result.set("geometry", feature.geometry == null ? null : encodeGeometry(feature.geometry))

    // ATTENTION: null properties are written as an empty object, not as null.
    result.set("properties", feature.properties == null ? new Map<string, JsonValue>() : cloneJsonObject(feature.properties))

    if (feature.bbox != undefined) {
        result.set("bbox", [...feature.bbox])
    }

    if (feature.id != undefined) {
        result.set("id", idToJson(feature.id))
    }

    if (feature.foreignMembers != undefined) {
        for (const [key, value] of feature.foreignMembers) {

            if (featureMembers.includes(key)) {
                continue
            }

            result.set(key, cloneJson(value))
        }
    }

    return result
}
