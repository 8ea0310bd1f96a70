import { LosslessNumber } from "lossless-json"
import { Id, numberId, stringId } from "./dataTypes/Id"
import { errorTypes } from "./errorTypes"
import { isJsonNumber, isJsonObject, jsonNumberToNumber, JsonObject, JsonValue, stringifyJson } from "./json"


// RFC 7946 5
export type Bbox = Array<number>


// Working copy of a GeoJSON object's members. The get* helpers below remove every member
// they consume, so that only foreign members are left at the end.
export type Members = Map<string, JsonValue>


export function toMembers(object: JsonObject): Members {
    return new Map(object)
}


export function describeValue(value: JsonValue): string {

    const json = stringifyJson(value, { keyOrder: "insertion", indent: 0 })

    return (json.length > 80) ? json.substring(0, 77) + "..." : json
}


export function takeMember(members: Members, key: string): JsonValue | undefined {

    const value = members.get(key)
    members.delete(key)

    return value
}


export function expectProperty(members: Members, key: string): JsonValue {

    const value = takeMember(members, key)

    if (value === undefined) {
        throw errorTypes.ExpectedProperty.withDetail(`Missing member '${key}'.`)
    }

    return value
}


export function expectType(members: Members): string {

    const type = takeMember(members, "type")

    if (type === undefined) {
        throw errorTypes.UnknownType.withDetail("Missing member 'type'.")
    }

    if (typeof (type) != "string") {
        throw errorTypes.UnknownType.withDetail("Member 'type' is not a string: " + describeValue(type))
    }

    return type
}


export function getProperties(members: Members): JsonObject | null {

    const properties = takeMember(members, "properties")

    if (properties === undefined) {
        throw errorTypes.FeatureMissingProperties.withDetail("")
    }

    if (properties === null) {
        return null
    }

    if (!isJsonObject(properties)) {
        throw errorTypes.PropertiesExpectedObjectOrNull.withDetail("Found: " + describeValue(properties))
    }

    return properties
}


export function getId(members: Members): Id | undefined {

    const id = takeMember(members, "id")

    if (id === undefined) {
        return undefined
    }

    if (typeof (id) == "string") {
        return stringId(id)
    }

    if (id instanceof LosslessNumber) {
        return numberId(id.value)
    }

    if (typeof (id) == "number") {
        return numberId(id)
    }

    // This includes null:
    throw errorTypes.FeatureInvalidIdentifierType.withDetail("Found: " + describeValue(id))
}


export function getBbox(members: Members): Bbox | undefined {

    const bbox = takeMember(members, "bbox")

    if (bbox === undefined) {
        return undefined
    }

    if (!(bbox instanceof Array)) {
        throw errorTypes.BboxExpectedArray.withDetail("Found: " + describeValue(bbox))
    }

    const result = Array<number>()

    for (const value of bbox) {

        const number = toFiniteNumber(value)

        if (number == undefined) {
            throw errorTypes.BboxExpectedNumericValues.withDetail("Found: " + describeValue(value))
        }

        result.push(number)
    }

    return result
}


// Also undefined for literals beyond the double range, such as 1e400:
export function toFiniteNumber(value: JsonValue): number | undefined {

    if (!isJsonNumber(value)) {
        return undefined
    }

    const number = jsonNumberToNumber(value)

    return Number.isFinite(number) ? number : undefined
}


export function getForeignMembers(members: Members): JsonObject | undefined {

    if (members.size == 0) {
        return undefined
    }

    return new Map(members)
}
