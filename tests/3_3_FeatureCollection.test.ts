import { expect } from "chai";
import { Feature } from "../src/dataTypes/Feature"
import { decodeFeatureCollectionValue, encodeFeatureCollection, FeatureCollection } from "../src/dataTypes/FeatureCollection"
import { stringId } from "../src/dataTypes/Id"
import { catchGeoJsonError, feature, jsonObject, keysOf } from "./testUtil"


describe('3.3 FeatureCollection', function () {

    it('should encode a FeatureCollection in canonical order', function () {

        const collection = new FeatureCollection([new Feature(null, jsonObject({ "a": 1 }))])

        expect(collection.toString()).equal('{"features":[{"geometry":null,"properties":{"a":1},"type":"Feature"}],"type":"FeatureCollection"}')
    })


    it('should decode features, bbox and foreign members', function () {

        const decoded = decodeFeatureCollectionValue(jsonObject({
            "type": "FeatureCollection",
            "features": [
                { "type": "Feature", "geometry": { "type": "Point", "coordinates": [1.1, 2.1] }, "properties": {} },
                { "type": "Feature", "geometry": null, "properties": null, "id": "b" }
            ],
            "bbox": [0, 0, 2, 2],
            "name": "Sample"
        }))

        expect(decoded).deep.equal(new FeatureCollection([feature(), new Feature(null, null, stringId("b"))], [0, 0, 2, 2], jsonObject({ "name": "Sample" })))
    })


    it('should round-trip a FeatureCollection', function () {

        const collection = new FeatureCollection([feature(), new Feature(null, jsonObject({ "b": [true] }), stringId("2"))], [1, 1, 2, 2], jsonObject({ "source": "test" }))

        expect(decodeFeatureCollectionValue(encodeFeatureCollection(collection))).deep.equal(collection)
    })


    it('should reject a missing or non-array features member', function () {

        expect(catchGeoJsonError(() => decodeFeatureCollectionValue(jsonObject({ "type": "FeatureCollection" }))).kind).equal("ExpectedProperty")
        expect(catchGeoJsonError(() => decodeFeatureCollectionValue(jsonObject({ "type": "FeatureCollection", "features": {} }))).kind).equal("ExpectedArrayValue")
    })


    it('should pass on errors of contained Features', function () {

        expect(catchGeoJsonError(() => decodeFeatureCollectionValue(jsonObject({ "type": "FeatureCollection", "features": [1] }))).kind).equal("ExpectedObject")

        const pointInList = { "type": "Point", "coordinates": [0, 0] }

        expect(catchGeoJsonError(() => decodeFeatureCollectionValue(jsonObject({ "type": "FeatureCollection", "features": [pointInList] }))).kind).equal("UnknownType")

        const badId = { "type": "Feature", "geometry": null, "properties": {}, "id": [1] }

        expect(catchGeoJsonError(() => decodeFeatureCollectionValue(jsonObject({ "type": "FeatureCollection", "features": [badId] }))).kind).equal("FeatureInvalidIdentifierType")
    })


    it('should reject a Feature given as FeatureCollection', function () {

        expect(catchGeoJsonError(() => FeatureCollection.fromJsonValue(jsonObject({ "type": "Feature", "geometry": null, "properties": {} }))).kind).equal("UnknownType")
    })


    it('should keep its own list of features', function () {

        const features = [feature()]

        const collection = new FeatureCollection(features)

        features.push(feature())

        expect(collection.features.length).equal(1)
        expect(keysOf(collection.toJsonObject())).deep.equal(["type", "features"])
    })
})
