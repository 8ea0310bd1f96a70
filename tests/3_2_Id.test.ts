import { expect } from "chai";
import { LosslessNumber } from "lossless-json"
import { defaultCodecConfig } from "../src/CodecConfig"
import { idEquals, idToJson, numberId, stringId } from "../src/dataTypes/Id"
import { stringifyJson } from "../src/json"
import { catchGeoJsonError } from "./testUtil"


describe('3.2 Feature identifier', function () {

    it('should compare identifiers by variant and value', function () {

        expect(idEquals(stringId("1"), stringId("1"))).equal(true)
        expect(idEquals(numberId(1), numberId(1))).equal(true)
        expect(idEquals(numberId(1), numberId("1"))).equal(true)
        expect(idEquals(stringId("1"), numberId(1))).equal(false)
        expect(idEquals(numberId(1), numberId(2))).equal(false)
        expect(idEquals(numberId("1"), numberId("1.0"))).equal(false)
    })


    it('should serialize each variant as its own JSON type', function () {

        expect(idToJson(stringId("0"))).equal("0")
        expect(idToJson(numberId(0))).deep.equal(new LosslessNumber("0"))
        expect(stringifyJson(idToJson(numberId(0)), defaultCodecConfig)).equal("0")
        expect(stringifyJson(idToJson(numberId(2.5)), defaultCodecConfig)).equal("2.5")
        expect(stringifyJson(idToJson(stringId("0")), defaultCodecConfig)).equal('"0"')
    })


    it('should keep a number literal as written', function () {

        expect(numberId("1.0")).deep.equal({ kind: "Number", value: "1.0" })
        expect(numberId("9007199254740993")).deep.equal({ kind: "Number", value: "9007199254740993" })
        expect(stringifyJson(idToJson(numberId("-2.50e+3")), defaultCodecConfig)).equal("-2.50e+3")
    })


    it('should reject numeric identifiers without JSON representation', function () {

        expect(catchGeoJsonError(() => numberId(NaN)).kind).equal("FeatureInvalidIdentifierType")
        expect(catchGeoJsonError(() => numberId(Infinity)).kind).equal("FeatureInvalidIdentifierType")

        const notALiteral = catchGeoJsonError(() => numberId("01"))

        expect(notALiteral.kind).equal("FeatureInvalidIdentifierType")
        expect(notALiteral.detail).equal("Not a JSON number literal: '01'")
        expect(catchGeoJsonError(() => numberId(" 1")).kind).equal("FeatureInvalidIdentifierType")
    })
})
