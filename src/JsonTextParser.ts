// RFC 8259 text to JsonValue.
//
// JSON.parse() cannot be used: it builds plain objects, which enumerate integer-like keys
// first, and it turns every number into a double. This parser builds Maps in document order
// and keeps each number as its literal text.

import { LosslessNumber } from "lossless-json"
import { errorTypes } from "./errorTypes"
import type { JsonObject, JsonValue } from "./json"
import type { GeoJsonError } from "./dataTypes/GeoJsonError"


export class JsonTextParser {

    // RFC 8259 6, sticky so that it only matches at the current position:
    private readonly numberPattern = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y

    private readonly whitespace = [" ", "\t", "\n", "\r"]

    private position = 0


    constructor(private readonly text: string) { }


    parse(): JsonValue {

        const value = this.parseValue()

        this.skipWhitespace()

        if (this.position < this.text.length) {
            throw this.error("Unexpected content after the JSON value")
        }

        return value
    }


    private parseValue(): JsonValue {

        this.skipWhitespace()

        if (this.position >= this.text.length) {
            throw this.error("Unexpected end of input")
        }

        switch (this.peek()) {
            case "{":
                return this.parseObject()
            case "[":
                return this.parseArray()
            case '"':
                return this.parseString()
            case "t":
                return this.parseLiteral("true", true)
            case "f":
                return this.parseLiteral("false", false)
            case "n":
                return this.parseLiteral("null", null)
            default:
                return this.parseNumber()
        }
    }


    private parseObject(): JsonObject {

        const result: JsonObject = new Map()

        this.expect("{")
        this.skipWhitespace()

        if (this.peek() == "}") {
            this.position++
            return result
        }

        while (true) {

            this.skipWhitespace()

            if (this.peek() != '"') {
                throw this.error("Expected a member name")
            }

            const key = this.parseString()

            this.skipWhitespace()
            this.expect(":")

            // Like JSON.parse(), a repeated name keeps its first position and its last value:
            result.set(key, this.parseValue())

            this.skipWhitespace()

            if (this.peek() != ",") {
                this.expect("}")
                return result
            }

            this.position++
        }
    }


    private parseArray(): Array<JsonValue> {

        const result = Array<JsonValue>()

        this.expect("[")
        this.skipWhitespace()

        if (this.peek() == "]") {
            this.position++
            return result
        }

        while (true) {

            result.push(this.parseValue())

            this.skipWhitespace()

            if (this.peek() != ",") {
                this.expect("]")
                return result
            }

            this.position++
        }
    }


    private parseString(): string {

        const start = this.position

        let end = start + 1

        // Find the closing quote. Escapes are decoded below.
        while (true) {

            if (end >= this.text.length) {
                throw this.error("Unterminated string")
            }

            const code = this.text.charCodeAt(end)

            if (code == 0x22) {
                break
            }

            if (code < 0x20) {
                this.position = end
                throw this.error("Control character in string")
            }

            end += (code == 0x5c) ? 2 : 1
        }

        this.position = end + 1

        let decoded: unknown

        try {
            decoded = JSON.parse(this.text.substring(start, end + 1))
        }
        catch (e) {
            this.position = start
            throw this.error("Invalid string escape")
        }

        if (typeof (decoded) != "string") {
            this.position = start
            throw this.error("Invalid string")
        }

        return decoded
    }


    private parseNumber(): LosslessNumber {

        this.numberPattern.lastIndex = this.position

        const match = this.numberPattern.exec(this.text)

        if (match == null) {
            throw this.error(`Unexpected character '${this.peek()}'`)
        }

        this.position += match[0].length

        return new LosslessNumber(match[0])
    }


    private parseLiteral<T extends boolean | null>(word: string, value: T): T {

        if (!this.text.startsWith(word, this.position)) {
            throw this.error(`Unexpected character '${this.peek()}'`)
        }

        this.position += word.length

        return value
    }


    //################# BEGIN Scanner helpers #################
    private peek(): string {
        return this.text.charAt(this.position)
    }


    private expect(char: string) {

        if (this.position >= this.text.length) {
            throw this.error(`Expected '${char}' but reached the end of input`)
        }

        if (this.peek() != char) {
            throw this.error(`Expected '${char}' but found '${this.peek()}'`)
        }

        this.position++
    }


    private skipWhitespace() {
        while (this.position < this.text.length && this.whitespace.includes(this.peek())) {
            this.position++
        }
    }


    private error(message: string): GeoJsonError {
        return errorTypes.MalformedJson.withDetail(`${message} at position ${this.position}.`)
    }
    //################# END Scanner helpers #################
}
