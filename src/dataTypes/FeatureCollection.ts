// RFC 7946 3.3

import { CodecConfig, defaultCodecConfig } from "../CodecConfig"
import { errorTypes } from "../errorTypes"
import { cloneJson, cloneJsonObject, isJsonObject, JsonObject, JsonValue, PlainJson, stringifyJson, toJsonValue, toPlainJson } from "../json"
import { Bbox, describeValue, expectProperty, expectType, getBbox, getForeignMembers, toMembers } from "../util"
import { decodeFeatureValue, encodeFeature, Feature } from "./Feature"


export const featureCollectionMembers: ReadonlyArray<string> = ["type", "features", "bbox"]


export class FeatureCollection {

    readonly type = "FeatureCollection"

    readonly features: Array<Feature>
    readonly bbox?: Bbox
    readonly foreignMembers?: JsonObject

    constructor(features: Array<Feature> = [], bbox?: Bbox, foreignMembers?: JsonObject) {
        this.features = [...features]
        this.bbox = (bbox == undefined) ? undefined : [...bbox]
        this.foreignMembers = (foreignMembers == undefined) ? undefined : cloneJsonObject(foreignMembers)
    }


    static fromJsonObject(object: JsonObject): FeatureCollection {
        return decodeFeatureCollectionObject(object)
    }


    static fromJsonValue(value: JsonValue): FeatureCollection {
        return decodeFeatureCollectionValue(value)
    }


    static fromJSON(value: unknown): FeatureCollection {
        return decodeFeatureCollectionValue(toJsonValue(value))
    }


    toJsonObject(): JsonObject {
        return encodeFeatureCollection(this)
    }


    toJSON(): PlainJson {
        return toPlainJson(encodeFeatureCollection(this))
    }


    toString(config: CodecConfig = defaultCodecConfig): string {
        return stringifyJson(encodeFeatureCollection(this), config)
    }
}


export function decodeFeatureCollectionObject(object: JsonObject): FeatureCollection {

    const members = toMembers(object)

    const type = expectType(members)

    if (type != "FeatureCollection") {
        throw errorTypes.UnknownType.withDetail(`Expected 'FeatureCollection', found '${type}'.`)
    }

    const features = expectProperty(members, "features")

    if (!(features instanceof Array)) {
        throw errorTypes.ExpectedArrayValue.withDetail("Member 'features' is not an array: " + describeValue(features))
    }

    return new FeatureCollection(features.map(decodeFeatureValue), getBbox(members), getForeignMembers(members))
}


export function decodeFeatureCollectionValue(value: JsonValue): FeatureCollection {

    if (!isJsonObject(value)) {
        throw errorTypes.ExpectedObject.withDetail("Found: " + describeValue(value))
    }

    return decodeFeatureCollectionObject(value)
}


export function encodeFeatureCollection(collection: FeatureCollection): JsonObject {

    const result: JsonObject = new Map()

    result.set("type", "FeatureCollection")

    result.set("features", collection.features.map(encodeFeature))

    if (collection.bbox != undefined) {
        result.set("bbox", [...collection.bbox])
    }

    if (collection.foreignMembers != undefined) {
        for (const [key, value] of collection.foreignMembers) {

            if (featureCollectionMembers.includes(key)) {
                continue
            }

            result.set(key, cloneJson(value))
        }
    }

    return result
}
