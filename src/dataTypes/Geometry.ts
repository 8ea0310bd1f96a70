// RFC 7946 3.1

import type { GeoJsonGeometryTypes, Position } from "geojson"
import { CodecConfig, defaultCodecConfig } from "../CodecConfig"
import { errorTypes } from "../errorTypes"
import { cloneJson, cloneJsonObject, isJsonObject, JsonObject, JsonValue, PlainJson, stringifyJson, toJsonValue, toPlainJson } from "../json"
import { Bbox, describeValue, expectProperty, expectType, getBbox, getForeignMembers, Members, takeMember, toFiniteNumber, toMembers } from "../util"


export const geometryTypes: ReadonlyArray<GeoJsonGeometryTypes> = ['Point',
    'MultiPoint',
    'LineString',
    'MultiLineString',
    'Polygon',
    'MultiPolygon',
    'GeometryCollection']


export type GeometryValue =
    { readonly type: "Point", readonly coordinates: Position } |
    { readonly type: "MultiPoint", readonly coordinates: Array<Position> } |
    { readonly type: "LineString", readonly coordinates: Array<Position> } |
    { readonly type: "MultiLineString", readonly coordinates: Array<Array<Position>> } |
    { readonly type: "Polygon", readonly coordinates: Array<Array<Position>> } |
    { readonly type: "MultiPolygon", readonly coordinates: Array<Array<Array<Position>>> } |
    { readonly type: "GeometryCollection", readonly geometries: Array<Geometry> }


export class Geometry {

    readonly value: GeometryValue
    readonly bbox?: Bbox
    readonly foreignMembers?: JsonObject

    // Coordinates, bbox and foreign members are copied, so the Geometry shares nothing with
    // the caller.
    constructor(value: GeometryValue, bbox?: Bbox, foreignMembers?: JsonObject) {
        this.value = copyGeometryValue(value)
        this.bbox = (bbox == undefined) ? undefined : [...bbox]
        this.foreignMembers = (foreignMembers == undefined) ? undefined : cloneJsonObject(foreignMembers)
    }


    static fromJsonObject(object: JsonObject): Geometry {
        return decodeGeometryObject(object)
    }


    static fromJsonValue(value: JsonValue): Geometry {
        return decodeGeometryValue(value)
    }


    static fromJSON(value: unknown): Geometry {
        return decodeGeometryValue(toJsonValue(value))
    }


    toJsonObject(): JsonObject {
        return encodeGeometry(this)
    }


    toJSON(): PlainJson {
        return toPlainJson(encodeGeometry(this))
    }


    toString(config: CodecConfig = defaultCodecConfig): string {
        return stringifyJson(encodeGeometry(this), config)
    }
}


export function decodeGeometryObject(object: JsonObject): Geometry {

    const members = toMembers(object)

    const type = expectType(members)

    const value = decodeGeometryVariant(type, members)

    return new Geometry(value, getBbox(members), getForeignMembers(members))
}


export function decodeGeometryValue(value: JsonValue): Geometry {

    if (!isJsonObject(value)) {
        throw errorTypes.ExpectedObject.withDetail("Found: " + describeValue(value))
    }

    return decodeGeometryObject(value)
}


export function encodeGeometry(geometry: Geometry): JsonObject {

    const result: JsonObject = new Map()

    const value = geometry.value

    result.set("type", value.type)

    if (value.type == "GeometryCollection") {
        result.set("geometries", value.geometries.map(encodeGeometry))
    }
    else {
        result.set("coordinates", cloneJson(value.coordinates))
    }

    if (geometry.bbox != undefined) {
        result.set("bbox", [...geometry.bbox])
    }

    if (geometry.foreignMembers != undefined) {
        for (const [key, member] of geometry.foreignMembers) {

            // Typed members always win over a foreign member with the same name:
            if (result.has(key)) {
                continue
            }

            result.set(key, cloneJson(member))
        }
    }

    return result
}


// Feature member helper (RFC 7946 3.2: "A Feature object has a member with the name "geometry".
// The value of the geometry member SHALL be either a Geometry object as defined above or,
// in the case that the Feature is unlocated, a JSON null value.")
export function getGeometry(members: Members): Geometry | null {

    const geometry = takeMember(members, "geometry")

    if (geometry === undefined) {
        throw errorTypes.FeatureMissingGeometry.withDetail("")
    }

    if (geometry === null) {
        return null
    }

    if (!isJsonObject(geometry)) {
        throw errorTypes.FeatureInvalidGeometryValue.withDetail("Found: " + describeValue(geometry))
    }

    return decodeGeometryObject(geometry)
}


function decodeGeometryVariant(type: string, members: Members): GeometryValue {

    switch (type) {
        case "Point":
            return { type: "Point", coordinates: toPosition(expectProperty(members, "coordinates")) }

        case "MultiPoint":
            return { type: "MultiPoint", coordinates: toPositions(expectProperty(members, "coordinates")) }

        case "LineString":
            return { type: "LineString", coordinates: toPositions(expectProperty(members, "coordinates")) }

        case "MultiLineString":
            return { type: "MultiLineString", coordinates: toArray(expectProperty(members, "coordinates")).map(toPositions) }

        case "Polygon":
            return { type: "Polygon", coordinates: toArray(expectProperty(members, "coordinates")).map(toPositions) }

        case "MultiPolygon":
            return {
                type: "MultiPolygon",
                coordinates: toArray(expectProperty(members, "coordinates")).map(polygon => toArray(polygon).map(toPositions))
            }

        case "GeometryCollection":
            return { type: "GeometryCollection", geometries: toArray(expectProperty(members, "geometries")).map(decodeGeometryValue) }

        default:
            throw errorTypes.UnknownType.withDetail(`'${type}' is not a Geometry type.`)
    }
}


//################# BEGIN Coordinate helpers #################
function toArray(value: JsonValue): Array<JsonValue> {

    if (!(value instanceof Array)) {
        throw errorTypes.ExpectedArrayValue.withDetail("Found: " + describeValue(value))
    }

    return value
}


function toPosition(value: JsonValue): Position {

    const array = toArray(value)

    if (array.length < 2) {
        throw errorTypes.PositionTooShort.withDetail(`Found ${array.length} element(s).`)
    }

    return array.map(element => {

        const number = toFiniteNumber(element)

        if (number == undefined) {
            throw errorTypes.ExpectedNumericValue.withDetail("Found: " + describeValue(element))
        }

        return number
    })
}


function toPositions(value: JsonValue): Array<Position> {
    return toArray(value).map(toPosition)
}


function copyPositions(positions: Array<Position>): Array<Position> {
    return positions.map(position => [...position])
}


function copyGeometryValue(value: GeometryValue): GeometryValue {

    switch (value.type) {
        case "Point":
            return { type: "Point", coordinates: [...value.coordinates] }

        case "MultiPoint":
        case "LineString":
            return { type: value.type, coordinates: copyPositions(value.coordinates) }

        case "MultiLineString":
        case "Polygon":
            return { type: value.type, coordinates: value.coordinates.map(copyPositions) }

        case "MultiPolygon":
            return { type: "MultiPolygon", coordinates: value.coordinates.map(polygon => polygon.map(copyPositions)) }

        case "GeometryCollection":
            // Geometry instances make their own copies when constructed.
            return { type: "GeometryCollection", geometries: [...value.geometries] }
    }
}
//################# END Coordinate helpers #################
