// Modelled on RFC 7807 problem details, see https://tools.ietf.org/html/rfc7807

export type GeoJsonErrorKind =
    "UnknownType" |
    "ExpectedObject" |
    "MalformedJson" |
    "InvalidJsonValue" |
    "FeatureMissingGeometry" |
    "FeatureInvalidGeometryValue" |
    "FeatureMissingProperties" |
    "PropertiesExpectedObjectOrNull" |
    "FeatureInvalidIdentifierType" |
    "BboxExpectedArray" |
    "BboxExpectedNumericValues" |
    "ExpectedProperty" |
    "ExpectedArrayValue" |
    "ExpectedNumericValue" |
    "PositionTooShort" |
    "InvalidConfig"


export class GeoJsonError extends Error {

    constructor(
        public readonly kind: GeoJsonErrorKind,
        public readonly title: string,
        public readonly detail: string) {

        super(detail == "" ? title : title + " " + detail)

        this.name = "GeoJsonError"
    }


    withDetail(detail: string): GeoJsonError {
        return new GeoJsonError(this.kind, this.title, detail)
    }
}
