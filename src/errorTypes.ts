// RFC 7946 sections 3, 3.1, 3.2, 3.3 and 5

import { GeoJsonError } from "./dataTypes/GeoJsonError"

export const errorTypes = {

    "UnknownType": new GeoJsonError("UnknownType",
        "The 'type' member is missing, is not a string or names an unexpected GeoJSON type.",
        ""),

    "ExpectedObject": new GeoJsonError("ExpectedObject",
        "Expected a JSON object.",
        ""),

    "MalformedJson": new GeoJsonError("MalformedJson",
        "The input is not well-formed JSON text.",
        ""),

    "InvalidJsonValue": new GeoJsonError("InvalidJsonValue",
        "The value cannot be represented in JSON.",
        ""),


    "FeatureMissingGeometry": new GeoJsonError("FeatureMissingGeometry",
        "A Feature object must have a member with the name 'geometry'.",
        ""),

    "FeatureInvalidGeometryValue": new GeoJsonError("FeatureInvalidGeometryValue",
        "The value of a Feature's 'geometry' member must be a Geometry object or null.",
        ""),

    "FeatureMissingProperties": new GeoJsonError("FeatureMissingProperties",
        "A Feature object must have a member with the name 'properties'.",
        ""),

    "PropertiesExpectedObjectOrNull": new GeoJsonError("PropertiesExpectedObjectOrNull",
        "The value of a Feature's 'properties' member must be an object or null.",
        ""),

    "FeatureInvalidIdentifierType": new GeoJsonError("FeatureInvalidIdentifierType",
        "The value of a Feature's 'id' member must be a string or a number.",
        ""),


    "BboxExpectedArray": new GeoJsonError("BboxExpectedArray",
        "The value of a 'bbox' member must be an array.",
        ""),

    "BboxExpectedNumericValues": new GeoJsonError("BboxExpectedNumericValues",
        "A 'bbox' array must contain numbers only.",
        ""),


    "ExpectedProperty": new GeoJsonError("ExpectedProperty",
        "A required GeoJSON member is missing.",
        ""),

    "ExpectedArrayValue": new GeoJsonError("ExpectedArrayValue",
        "Expected a JSON array.",
        ""),

    "ExpectedNumericValue": new GeoJsonError("ExpectedNumericValue",
        "Expected a JSON number.",
        ""),

    "PositionTooShort": new GeoJsonError("PositionTooShort",
        "A position must have two or more elements.",
        ""),


    "InvalidConfig": new GeoJsonError("InvalidConfig",
        "The codec configuration is invalid.",
        "")
}
