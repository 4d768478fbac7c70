import { GoogleGenAI } from '@google/genai'
import { z } from 'zod'
import { ClassificationParseError, describeError } from './errors'
import type { ClassificationResult } from './types'

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash'

export const ANALYSIS_PROMPT = `You are looking at a still frame from a doorbell camera. The camera captured it because it detected motion.

Decide whether the frame shows a possible package thief, or a delivery driver dropping a package off.

Signs of theft:
1. A person lifting a package that had been left at the door
2. A person near packages who keeps glancing around
3. A person who grabs something quickly and leaves
4. A person who does not look like a courier handling a package
5. Several people where one seems to keep watch

Harmless explanations:
- The resident collecting their own package
- A courier leaving a package
- A neighbour or an expected guest
- Motion from animals, passing cars or wind

Reply with one JSON object and nothing else:
{
    "is_suspicious": true/false,
    "confidence_of_suspicion": "high"/"medium"/"low",
    "is_delivery": true/false,
    "description": "Short description of the scene",
    "reason": "Why the frame was or was not flagged"
}

Set is_suspicious to true only with medium or high confidence that a package is being, or is about to be, stolen. If unsure, lean towards flagging it.

Set is_delivery to true only if a courier is clearly dropping off a package.
`

export type GenerateRequest = {
  model: string
  image: Buffer
  prompt: string
}

/** Sends one image plus prompt to the model and returns its raw text reply. */
export type GenerateText = (request: GenerateRequest) => Promise<string>

export interface Classifier {
  classify(image: Buffer): Promise<ClassificationResult>
}

const confidenceSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['high', 'medium', 'low'])
)

const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined)

const payloadSchema = z
  .object({
    is_suspicious: lenient(z.boolean()),
    confidence: lenient(confidenceSchema),
    confidence_of_suspicion: lenient(confidenceSchema),
    is_delivery: lenient(z.boolean()),
    description: lenient(z.string()),
    reason: lenient(z.string()),
  })
  .passthrough()

/**
 * Pulls the JSON body out of a model reply, unwrapping a ```json or bare ```
 * fence when there is one.
 */
export const extractJsonPayload = (text: string): string => {
  const fenced = /```(?:json)?\s*([\s\S]*?)(?:```|$)/.exec(text)
  return (fenced ? fenced[1] : text).trim()
}

export const parseClassification = (text: string): ClassificationResult => {
  let raw: unknown
  try {
    raw = JSON.parse(extractJsonPayload(text))
  } catch (error) {
    throw new ClassificationParseError(describeError(error))
  }

  const parsed = payloadSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ClassificationParseError('Response is not a JSON object')
  }

  const payload = parsed.data
  return {
    isSuspicious: payload.is_suspicious ?? false,
    confidence: payload.confidence ?? payload.confidence_of_suspicion ?? 'low',
    isDelivery: payload.is_delivery ?? false,
    description: payload.description ?? '',
    reason: payload.reason ?? '',
  }
}

export const safeDefaultClassification = (reason: string): ClassificationResult => ({
  isSuspicious: false,
  confidence: 'low',
  isDelivery: false,
  description: 'analysis failed',
  reason,
})

export const createGeminiGenerate = (apiKey: string): GenerateText => {
  const ai = new GoogleGenAI({ apiKey })
  return async ({ model, image, prompt }) => {
    const response = await ai.models.generateContent({
      model,
      contents: {
        parts: [
          {
            inlineData: {
              mimeType: 'image/jpeg',
              data: image.toString('base64'),
            },
          },
          { text: prompt },
        ],
      },
    })
    return response.text ?? ''
  }
}

type ClassifierOptions = {
  model?: string
  prompt?: string
  generate: GenerateText
}

/**
 * Vision classifier. Errors from the model API propagate; a reply that cannot
 * be parsed becomes the safe default.
 */
export const createClassifier = ({
  model = DEFAULT_GEMINI_MODEL,
  prompt = ANALYSIS_PROMPT,
  generate,
}: ClassifierOptions): Classifier => ({
  classify: async (image) => {
    const text = await generate({ model, image, prompt })

    try {
      const result = parseClassification(text)
      console.log('[Classifier] Analysis:', result)
      return result
    } catch (error) {
      const message = describeError(error)
      console.error('[Classifier] Failed to parse model response as JSON:', message)
      console.error('[Classifier] Raw response:', text)
      return safeDefaultClassification(`JSON parse error: ${message}`)
    }
  },
})
