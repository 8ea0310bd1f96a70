import * as fs from 'fs'
import { z } from 'zod'
import { errorTypes } from "./errorTypes"
import { parseJson, toPlainJson } from "./json"


export const DEFAULT_CONFIG_PATH = "./geojson_codec_config.json"


/**
 * Settings for the textual form of encoded GeoJSON.
 */
export const codecConfigSchema = z.object({
    keyOrder: z
        .enum(["alphabetic", "insertion"])
        .default("alphabetic")
        .describe('Order of object members in text output, applied at every nesting level. "insertion" keeps the order in which the encoder built the object.'),

    indent: z
        .number()
        .int()
        .min(0)
        .max(10)
        .default(0)
        .describe("Spaces per nesting level. 0 writes compact single-line text."),
}).strict()


export type CodecConfig = z.infer<typeof codecConfigSchema>


export const defaultCodecConfig: CodecConfig = codecConfigSchema.parse({})


/**
 * Reads codec settings from a JSON file, for applications that want the text form to be
 * configurable. The codec itself never reads a file: every `toString()` and `stringify*()`
 * call takes its settings as an argument and uses `defaultCodecConfig` without one.
 *
 * A missing file gives the defaults.
 */
export function readCodecConfig(path: string = DEFAULT_CONFIG_PATH): CodecConfig {

    let config_string: string

    try {
        config_string = fs.readFileSync(path).toString()
    }
    catch (e) {
        if (e instanceof Error && "code" in e && e.code == "ENOENT") {
            console.log("No codec config file found at " + path + ". Using default settings.")
            return defaultCodecConfig
        }

        throw e
    }

    const result = codecConfigSchema.safeParse(toPlainJson(parseJson(config_string)))

    if (!result.success) {
        const issues = result.error.issues.map(issue => (issue.path.length > 0 ? issue.path.join(".") + ": " : "") + issue.message)
        throw errorTypes.InvalidConfig.withDetail(path + ": " + issues.join("; "))
    }

    return result.data
}
