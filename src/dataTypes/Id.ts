// RFC 7946 3.2
//
// "If a Feature has a commonly used identifier, that identifier SHOULD be included as a member
// of the Feature object with the name "id", and the value of this member is either a JSON string
// or number."

import { isNumber, LosslessNumber } from "lossless-json"
import { errorTypes } from "../errorTypes"


export interface StringId {
    readonly kind: "String"
    readonly value: string
}

// The number literal as written, e.g. "1.0" or "9007199254740993", so that it is encoded again
// without any change of form or precision.
export interface NumberId {
    readonly kind: "Number"
    readonly value: string
}

export type Id = StringId | NumberId


export function stringId(value: string): StringId {
    return { kind: "String", value: value }
}


export function numberId(value: number | string): NumberId {

    if (typeof (value) == "number") {

        // NaN and the infinities have no JSON number representation:
        if (!Number.isFinite(value)) {
            throw errorTypes.FeatureInvalidIdentifierType.withDetail(`Numeric identifier is not finite: ${value}`)
        }

        return { kind: "Number", value: String(value) }
    }

    if (!isNumber(value)) {
        throw errorTypes.FeatureInvalidIdentifierType.withDetail(`Not a JSON number literal: '${value}'`)
    }

    return { kind: "Number", value: value }
}


export function idToJson(id: Id): string | LosslessNumber {
    return id.kind == "String" ? id.value : new LosslessNumber(id.value)
}


// Number ids compare by literal, so 1 and 1.0 are different ids.
export function idEquals(a: Id, b: Id): boolean {
    return a.kind == b.kind && a.value === b.value
}
