/**
 * Translation instruction for the Tagalog backend.
 *
 * The instruction is a pure function of tone and glossary: it is rendered once
 * per run and sent unchanged with every chunk, which keeps terminology and
 * register consistent across chunk boundaries.
 */

import type { InstructionOptions, Tone } from './types';

const TONE_DIRECTIVES: Record<Tone, string[]> = {
  formal: [
    'Gamitin ang magalang at pormal na Tagalog (Filipino) na angkop sa opisyal na dokumento.',
    'Gamitin ang "po" at "opo" kung kinakailangan at ang magalang na panghalip na "kayo/ninyo/inyo" sa pagtukoy sa mambabasa.',
    'Iwasan ang balbal, Taglish, at mga pinaikling anyo (hal. "di", "\'yan", "pwede" sa halip na "hindi", "iyan", "maaari").',
  ],
  informal: [
    'Gamitin ang natural at malinaw na Tagalog (Filipino) na pang-araw-araw, para sa pangkalahatang mambabasa.',
    'Gamitin ang "ikaw/ka/mo" sa pagtukoy sa mambabasa at mga karaniwang pinaikling anyo kung mas natural ("di", "\'yan", "pwede").',
    'Tanggap ang mga salitang Ingles na karaniwang ginagamit sa Filipino kung mas natural ang mga ito kaysa sa salin.',
  ],
};

const PRESERVATION_RULES = [
  'mga pangalan ng tao, lugar, organisasyon, produkto, at brand',
  'mga URL at email address',
  'inline code (teksto sa loob ng `backticks`) at buong code block',
  'mga numero, petsa, halaga ng pera, porsiyento, at unit (hal. 8GB, 48 oras, 3.5 km)',
];

const QUALITY_RULES = [
  'Panatilihin ang kahulugan, tono, at intensyon ng orihinal.',
  'Iwasan ang literal o salita-por-salitang salin; kung may katumbas na idyoma sa Filipino, iyon ang gamitin.',
  'Gamitin nang wasto ang mga pantukoy at pang-ukol ("ang/ng/sa", "si/ni/kay", "sina/nina/kina") at ang "ng" at "nang".',
  'Huwag magdagdag o magbawas ng impormasyon, at huwag magkomento: ang salin lamang ang ilalabas.',
  'Kung may di-malinaw, isalin sa pinaka-makatwirang paraan batay sa konteksto.',
];

const quote = (term: string) => `“${term}”`;

export const buildGlossaryDirective = (glossary: readonly string[]): string | null => {
  if (glossary.length === 0) {
    return null;
  }
  return [
    'Huwag isalin ang mga sumusunod na termino; panatilihing eksakto ang baybay at malaki/maliit na titik:',
    ...glossary.map((term) => `  - ${quote(term)}`),
  ].join('\n');
};

export const buildInstruction = ({ tone, glossary }: InstructionOptions): string => {
  const glossaryDirective = buildGlossaryDirective(glossary);

  return [
    'Ikaw ay isang propesyonal at lubos na maingat na tagasalin mula Ingles patungong Tagalog (Filipino).',
    'Layunin: tumpak, kumpleto, at idyomatikong salin na may tamang daloy at konteksto.',
    '',
    'TONO:',
    ...TONE_DIRECTIVES[tone].map((line) => `- ${line}`),
    '',
    'PANATILIHIN NANG EKSAKTO (huwag isalin o baguhin):',
    ...PRESERVATION_RULES.map((rule) => `- ${rule}`),
    ...(glossaryDirective ? ['', glossaryDirective] : []),
    '',
    'MGA PANUNTUNAN:',
    ...QUALITY_RULES.map((rule) => `- ${rule}`),
    '',
    'OUTPUT: Isang kumpletong salin sa Tagalog. Panatilihin ang mga talata at format ng orihinal; paghiwalayin ang mga talata ng isang blangkong linya.',
  ].join('\n');
};

/** User input for one backend request */
export const buildChunkInput = (chunkText: string): string =>
  `Isalin ang sumusunod na teksto sa Tagalog (Filipino):\n\n${chunkText}\n`;
