export const DEFAULT_IMAGE_QUESTION = 'What is this disease and how do I treat it?';

export function buildDiseasePrompt(diseaseBlock: string, question: string): string {
  return `A farmer has sent an image of their crop with this disease detection result:

${diseaseBlock}

The farmer asks: ${question}

Provide:
1. Explanation of what this disease is
2. Why it occurs
3. Treatment options (organic and chemical)
4. Prevention tips for the future

Keep your response practical and actionable for a smallholder farmer.`;
}

export function buildWeatherPrompt(
  question: string,
  location: string,
  weatherReport: string,
  plantingNotes: string[]
): string {
  let prompt = `The farmer asks: ${question}

Here's the current weather for their location (${location}):
${weatherReport}`;

  if (plantingNotes.length > 0) {
    prompt += `\n\nPlanting calendar for their crops this month:\n${plantingNotes.join('\n')}`;
  }

  return `${prompt}\n\nProvide farming advice based on this weather information.`;
}
