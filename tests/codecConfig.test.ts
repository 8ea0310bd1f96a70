import { expect } from "chai";
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { DEFAULT_CONFIG_PATH, defaultCodecConfig, readCodecConfig } from "../src/CodecConfig"
import { catchGeoJsonError } from "./testUtil"


describe('Codec configuration', function () {

    let dir = ""

    before(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "geojson-codec-"))
    })

    after(() => {
        fs.rmSync(dir, { recursive: true, force: true })
    })


    function writeConfig(name: string, content: string): string {
        const file = path.join(dir, name)
        fs.writeFileSync(file, content)
        return file
    }


    it('should fall back to the defaults if the file does not exist', function () {

        expect(readCodecConfig(path.join(dir, "missing.json"))).deep.equal({ keyOrder: "alphabetic", indent: 0 })
        expect(defaultCodecConfig).deep.equal({ keyOrder: "alphabetic", indent: 0 })
    })


    it('should read the defaults from the default path, where no file is shipped', function () {

        expect(fs.existsSync(DEFAULT_CONFIG_PATH)).equal(false)
        expect(readCodecConfig()).deep.equal(defaultCodecConfig)
    })


    it('should fill in missing settings with defaults', function () {

        const file = writeConfig("indent.json", '{ "indent": 2 }')

        expect(readCodecConfig(file)).deep.equal({ keyOrder: "alphabetic", indent: 2 })
    })


    it('should read all settings', function () {

        const file = writeConfig("full.json", '{ "keyOrder": "insertion", "indent": 4 }')

        expect(readCodecConfig(file)).deep.equal({ keyOrder: "insertion", indent: 4 })
    })


    it('should reject invalid settings', function () {

        const negative = catchGeoJsonError(() => readCodecConfig(writeConfig("negative.json", '{ "indent": -1 }')))
        expect(negative.kind).equal("InvalidConfig")

        const unknownOrder = catchGeoJsonError(() => readCodecConfig(writeConfig("order.json", '{ "keyOrder": "random" }')))
        expect(unknownOrder.kind).equal("InvalidConfig")

        const unknownKey = catchGeoJsonError(() => readCodecConfig(writeConfig("unknown.json", '{ "color": "red" }')))
        expect(unknownKey.kind).equal("InvalidConfig")
    })


    it('should reject a file that is not JSON', function () {

        const error = catchGeoJsonError(() => readCodecConfig(writeConfig("broken.json", 'indent = 2')))

        expect(error.kind).equal("MalformedJson")
    })
})
