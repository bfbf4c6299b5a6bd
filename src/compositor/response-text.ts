import type OpenAI from 'openai'

export function stripMarkdownFences(raw: string): string {
  const trimmed = raw.trim()
  if (!trimmed.startsWith('```')) return trimmed
  return trimmed.replace(/^```[a-zA-Z]*\n?/, '').replace(/```$/, '').trim()
}

export function extractResponseOutputText(response: OpenAI.Responses.Response): string | undefined {
  const direct = response.output_text
  if (typeof direct === 'string' && direct.trim().length > 0) return direct

  for (const item of response.output ?? []) {
    if (item.type !== 'message') continue
    for (const c of item.content) {
      if (c.type === 'output_text' && c.text.trim().length > 0) return c.text
    }
  }

  return undefined
}
