// RFC 8259 value model plus the canonical text form used for GeoJSON output

import { LosslessNumber } from "lossless-json"
import type { CodecConfig } from "./CodecConfig"
import { errorTypes } from "./errorTypes"
import { JsonTextParser } from "./JsonTextParser"


// Objects are Maps, so that every key (also "10" or "__proto__") keeps its insertion position.
// Numbers read from text are LosslessNumbers holding the literal as written. Numbers built
// in-process may be plain numbers.
export type JsonValue = null | boolean | number | LosslessNumber | string | Array<JsonValue> | JsonObject

export type JsonObject = Map<string, JsonValue>


// What JSON.stringify() and JSON.parse() work with:
export type PlainJson = null | boolean | number | string | Array<PlainJson> | { [key: string]: PlainJson }


export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return value instanceof Map
}


export function isJsonNumber(value: JsonValue | undefined): value is number | LosslessNumber {
    return typeof (value) == "number" || value instanceof LosslessNumber
}


export function jsonNumberToNumber(value: number | LosslessNumber): number {
    return typeof (value) == "number" ? value : Number(value.value)
}


export function parseJson(text: string): JsonValue {
    return new JsonTextParser(text).parse()
}


//################# BEGIN Copying and conversion #################
export function cloneJson(value: JsonValue): JsonValue {

    if (value instanceof LosslessNumber) {
        return new LosslessNumber(value.value)
    }

    if (value instanceof Array) {
        return value.map(cloneJson)
    }

    if (value instanceof Map) {
        return cloneJsonObject(value)
    }

    return value
}


export function cloneJsonObject(object: JsonObject): JsonObject {

    const result: JsonObject = new Map()

    for (const [key, value] of object) {
        result.set(key, cloneJson(value))
    }

    return result
}


/**
 * Converts plain JavaScript data (for example the result of `JSON.parse()`) into a fresh
 * JsonValue. Maps with string keys are accepted as objects.
 *
 * Plain objects are read in JavaScript's own key order, which puts integer-like keys first.
 * Use parseJson() where the document order of such keys matters.
 */
export function toJsonValue(value: unknown): JsonValue {

    if (value === null || typeof (value) == "string" || typeof (value) == "boolean") {
        return value
    }

    if (typeof (value) == "number") {

        if (!Number.isFinite(value)) {
            throw errorTypes.InvalidJsonValue.withDetail(`Found the non-finite number ${value}.`)
        }

        return value
    }

    if (value instanceof LosslessNumber) {
        return new LosslessNumber(value.value)
    }

    if (value instanceof Array) {
        return value.map(toJsonValue)
    }

    const result: JsonObject = new Map()

    if (value instanceof Map) {

        for (const [key, member] of value) {

            if (typeof (key) != "string") {
                throw errorTypes.InvalidJsonValue.withDetail(`Found a Map key of type ${typeof (key)}.`)
            }

            result.set(key, toJsonValue(member))
        }

        return result
    }

    if (typeof (value) == "object") {

        const proto = Object.getPrototypeOf(value)

        if (proto != Object.prototype && proto != null) {
            throw errorTypes.InvalidJsonValue.withDetail(`Found an instance of ${value.constructor.name}.`)
        }

        for (const [key, member] of Object.entries(value)) {
            result.set(key, toJsonValue(member))
        }

        return result
    }

    if (value === undefined) {
        throw errorTypes.InvalidJsonValue.withDetail("Found undefined.")
    }

    throw errorTypes.InvalidJsonValue.withDetail(`Found a value of type ${typeof (value)}.`)
}


export function toJsonObject(value: unknown): JsonObject {

    const result = toJsonValue(value)

    if (!isJsonObject(result)) {
        throw errorTypes.ExpectedObject.withDetail("Found: " + stringifyJson(result, { keyOrder: "insertion", indent: 0 }))
    }

    return result
}


// For toJSON() hooks. Numbers become doubles here, so the literal form of a
// LosslessNumber is only kept by stringifyJson().
export function toPlainJson(value: JsonValue): PlainJson {

    if (value instanceof LosslessNumber) {
        return Number(value.value)
    }

    if (value instanceof Array) {
        return value.map(toPlainJson)
    }

    if (value instanceof Map) {

        const result: { [key: string]: PlainJson } = {}

        for (const [key, member] of value) {
            // NOTE: Plain assignment would treat the key "__proto__" as a prototype change.
            Object.defineProperty(result, key, { value: toPlainJson(member), writable: true, enumerable: true, configurable: true })
        }

        return result
    }

    return value
}
//################# END Copying and conversion #################


export function stringifyJson(value: JsonValue, config: CodecConfig): string {
    return writeValue(value, config, "")
}


function writeValue(value: JsonValue, config: CodecConfig, indentation: string): string {

    // Written exactly as it was read:
    if (value instanceof LosslessNumber) {
        return value.value
    }

    // Other scalars. Like JSON.stringify(), non-finite numbers are written as null.
    if (value === null || typeof (value) != "object") {
        return JSON.stringify(value)
    }

    const innerIndentation = indentation + " ".repeat(config.indent)
    const newline = config.indent > 0 ? "\n" : ""

    if (value instanceof Array) {

        if (value.length == 0) {
            return "[]"
        }

        const items = value.map(item => innerIndentation + writeValue(item, config, innerIndentation))

        return "[" + newline + items.join("," + newline) + newline + indentation + "]"
    }

    if (value.size == 0) {
        return "{}"
    }

    const entries = Array.from(value.entries())

    // Sorted by UTF-16 code units, like Array.prototype.sort() without a comparator:
    if (config.keyOrder == "alphabetic") {
        entries.sort((a, b) => a[0] < b[0] ? -1 : (a[0] > b[0] ? 1 : 0))
    }

    const separator = config.indent > 0 ? ": " : ":"

    const members = entries.map(([key, member]) => innerIndentation + JSON.stringify(key) + separator + writeValue(member, config, innerIndentation))

    return "{" + newline + members.join("," + newline) + newline + indentation + "}"
}
