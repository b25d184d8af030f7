import { cleanModelReply, stripReasoning, toWhatsAppMarkup } from '../src/utils/responseCleaner';

describe('Response Cleaner', () => {
  test('removes reasoning blocks', () => {
    expect(stripReasoning('<think>what season is it?</think>Plant now.')).toBe('Plant now.');
    expect(stripReasoning('Step one. <THINK>aside</THINK> Step two.')).toBe('Step one. Step two.');
  });

  test('converts Markdown emphasis and headings to WhatsApp markup', () => {
    expect(toWhatsAppMarkup('## Treatment\nUse **copper fungicide** every __two weeks__.')).toBe(
      '*Treatment*\nUse *copper fungicide* every _two weeks_.'
    );
  });

  test('leaves WhatsApp bold untouched', () => {
    expect(toWhatsAppMarkup('*Prevention:* rotate crops')).toBe('*Prevention:* rotate crops');
  });

  test('collapses blank lines and repeated spaces but keeps single line breaks', () => {
    expect(cleanModelReply('1. Weed\n\n\n\n2.  Spray\n3. Harvest')).toBe('1. Weed\n\n2. Spray\n3. Harvest');
  });

  test('returns an empty string for a reply that was only reasoning', () => {
    expect(cleanModelReply('<think>hmm</think>')).toBe('');
  });
});
