import { ClassificationResult, DiseaseInfo, Prediction } from '../types/advisory';

export const IMAGE_UNAVAILABLE_TEXT = `Sorry, I couldn't analyze this image. This could be because:

1. The image is unclear or too dark
2. The crop is not visible enough
3. The disease detection service is temporarily unavailable

Please try:
- Taking a clearer photo in good lighting
- Getting closer to the affected part of the plant
- Sending the photo again

You can also describe what you see and I'll do my best to help!`;

export const LOW_CONFIDENCE_NOTE =
  '💡 *Note:* The confidence is low. Please provide more details or a clearer image for a better diagnosis.';

export type ConfidenceTier = {
  label: 'very confident' | 'fairly confident' | 'uncertain - this is my best guess';
  marker: '✅' | '⚠️' | '❓';
};

const MAX_ALTERNATIVES = 2;

/**
 * `Northern_Corn_leaf_blight` -> `Northern Corn Leaf Blight`. Every run of
 * letters is title-cased on its own, so `Corn_(maize)` becomes `Corn (Maize)`.
 */
export function normalizeLabel(label: string): string {
  return label
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function confidenceTier(confidence: number): ConfidenceTier {
  if (confidence >= 80) {
    return { label: 'very confident', marker: '✅' };
  }
  if (confidence >= 60) {
    return { label: 'fairly confident', marker: '⚠️' };
  }
  return { label: 'uncertain - this is my best guess', marker: '❓' };
}

function isLoadingPlaceholder(predictions: ClassificationResult): predictions is [Prediction & { note: string }, ...Prediction[]] {
  return predictions.length > 0 && predictions[0].note !== undefined;
}

/**
 * Turns classifier output into the reply block shown above the model's
 * treatment advice.
 */
export function formatDiseaseResult(predictions: ClassificationResult): string {
  if (predictions.length === 0) {
    return IMAGE_UNAVAILABLE_TEXT;
  }

  if (isLoadingPlaceholder(predictions)) {
    return predictions[0].note;
  }

  const [top, ...rest] = predictions;
  const confidence = top.score * 100;
  const tier = confidenceTier(confidence);

  let result = '🔍 *Disease Detection Results*\n\n';
  result += `${tier.marker} *Most Likely: ${normalizeLabel(top.label)}*\n`;
  result += `Confidence: ${confidence.toFixed(1)}% (${tier.label})\n`;

  if (confidence < 80 && rest.length > 0) {
    result += '\n*Other possibilities:*\n';
    for (const alternative of rest.slice(0, MAX_ALTERNATIVES)) {
      result += `• ${normalizeLabel(alternative.label)} (${(alternative.score * 100).toFixed(1)}%)\n`;
    }
  }

  if (confidence < 60) {
    result += `\n${LOW_CONFIDENCE_NOTE}`;
  }

  return result;
}

export function extractDiseaseInfo(predictions: ClassificationResult): DiseaseInfo {
  if (predictions.length === 0 || isLoadingPlaceholder(predictions) || !predictions[0].label) {
    return {
      disease: 'Unknown',
      confidence: 0,
      alternatives: [],
      status: 'error'
    };
  }

  const [top, ...rest] = predictions;
  return {
    disease: normalizeLabel(top.label),
    confidence: top.score,
    alternatives: rest.slice(0, MAX_ALTERNATIVES).map(p => ({
      disease: normalizeLabel(p.label),
      confidence: p.score
    })),
    status: 'success'
  };
}
