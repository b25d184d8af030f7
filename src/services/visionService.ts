import axios from 'axios';
import sharp from 'sharp';
import { ClassificationResult, Prediction } from '../types/advisory';
import { ImageClassifier } from '../types/collaborators';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const INFERENCE_URL = 'https://api-inference.huggingface.co/models';

// General plant disease model, plus a maize-specific one picked by crop hint
export const PRIMARY_MODEL = 'Diginsa/Plant-Disease-Detection-Project';
export const MAIZE_MODEL = 'Lematrixai/corn_maize-disease-detection';

const MAX_PREDICTIONS = 5;
const MAX_EDGE = 1024;
const JPEG_QUALITY = 85;

export const MODEL_LOADING_NOTE =
  'The disease detection model is starting up. Please try again in 20 seconds.';

export interface VisionServiceOptions {
  token?: string;
  timeoutMs?: number;
}

function isPrediction(value: unknown): value is Prediction {
  return (
    typeof value === 'object' &&
    value !== null &&
    'label' in value &&
    'score' in value &&
    typeof value.label === 'string' &&
    typeof value.score === 'number'
  );
}

/**
 * Decodes the upload and re-encodes it as an upright RGB JPEG no larger than
 * 1024px on either edge. Resolves to null when the bytes are not an image.
 */
export async function prepareImage(image: Buffer): Promise<Buffer | null> {
  try {
    return await sharp(image)
      .rotate()
      .resize({ width: MAX_EDGE, height: MAX_EDGE, fit: 'inside', withoutEnlargement: true })
      .removeAlpha()
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
  } catch (error) {
    logger.logError('Could not decode image', describeError(error));
    return null;
  }
}

/**
 * Crop disease classifier on the Hugging Face hosted inference API.
 * Never throws. Bytes that do not decode as an image yield `[]` without a
 * request, as does a failing endpoint; a cold model yields a single loading
 * placeholder.
 */
export class VisionService implements ImageClassifier {
  private token?: string;
  private timeoutMs: number;

  constructor(options: VisionServiceOptions = {}) {
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30000;

    if (!this.token) {
      logger.logVision('HUGGING_FACE_TOKEN not set - image analysis may be rate limited');
    }
  }

  modelFor(cropHint?: string): string {
    return cropHint?.trim().toLowerCase() === 'maize' ? MAIZE_MODEL : PRIMARY_MODEL;
  }

  async classify(image: Buffer, cropHint?: string): Promise<ClassificationResult> {
    const model = this.modelFor(cropHint);
    const headers: Record<string, string> = { 'Content-Type': 'application/octet-stream' };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const prepared = await prepareImage(image);
    if (!prepared) {
      return [];
    }

    try {
      logger.logVision(`Classifying image (${image.length} bytes, sent as ${prepared.length}) with ${model}`);

      const response = await axios.post<unknown>(`${INFERENCE_URL}/${model}`, prepared, {
        headers,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });

      if (response.status === 503) {
        logger.logVision('Model is loading');
        return [{ label: 'Model Loading', score: 0, note: MODEL_LOADING_NOTE }];
      }

      if (response.status !== 200 || !Array.isArray(response.data)) {
        logger.logError(`Classifier returned ${response.status}`, response.data);
        return [];
      }

      const predictions = response.data
        .filter(isPrediction)
        .map(p => ({ label: p.label, score: p.score }))
        .sort((a, b) => b.score - a.score)
        .slice(0, MAX_PREDICTIONS);

      logger.logVision(`Analysis successful: ${predictions.length} predictions`);
      return predictions;
    } catch (error) {
      logger.logError('Error analyzing image', describeError(error));
      return [];
    }
  }
}
