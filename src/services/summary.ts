export type SummaryVariant = "briefing" | "caravan" | "touring";

export type SummaryInput = {
  rainMm: number;
  windAvgKmh: number;
  windGustKmh: number;
  overnightTempC?: number | null;
};

type BandPhrases = { high: string; medium: string; low: string };

type PhraseSet = {
  wind: BandPhrases;
  rain: BandPhrases;
  temperature: BandPhrases | null;
};

const TEMPERATURE_PHRASES: BandPhrases = {
  high: "Cold overnight, you’ll want decent heating.",
  medium: "Cool overnight, a bit of extra bedding is a good idea.",
  low: "Overnight temperatures are fairly mild.",
};

const PHRASES: Record<SummaryVariant, PhraseSet> = {
  briefing: {
    wind: {
      high: "Windy with periods that will feel uncomfortable for towing.",
      medium: "A bit breezy at times but manageable for most rigs.",
      low: "Light winds for most of the day.",
    },
    rain: {
      high: "Expect solid rain at times, roads will be wet and campsites muddy.",
      medium: "Some showers around, roads and sites may be damp.",
      low: "Mostly dry with only light or brief showers, if any.",
    },
    temperature: null,
  },
  caravan: {
    wind: {
      high: "Windy with periods that will feel uncomfortable for towing.",
      medium: "A bit breezy at times but manageable for most rigs.",
      low: "Light winds for most of the day.",
    },
    rain: {
      high: "Expect solid rain at times, roads will be wet.",
      medium: "Some showers around, roads may be damp.",
      low: "Mostly dry with only light or brief showers, if any.",
    },
    temperature: TEMPERATURE_PHRASES,
  },
  touring: {
    wind: {
      high: "Windy with stretches that will feel tiring for towing.",
      medium: "A bit breezy at times but manageable for most rigs.",
      low: "Light winds for most of the day.",
    },
    rain: {
      high: "Expect proper rain at times, roads will stay wet.",
      medium: "Some showers around, roads may be damp.",
      low: "Mostly dry with only light or brief showers, if any.",
    },
    temperature: TEMPERATURE_PHRASES,
  },
};

function windBand({ windAvgKmh, windGustKmh }: SummaryInput): keyof BandPhrases {
  if (windAvgKmh >= 30 || windGustKmh >= 40) return "high";
  if (windAvgKmh >= 20) return "medium";
  return "low";
}

function rainBand({ rainMm }: SummaryInput): keyof BandPhrases {
  if (rainMm >= 8) return "high";
  if (rainMm >= 2) return "medium";
  return "low";
}

function temperatureBand(tempC: number): keyof BandPhrases {
  if (tempC <= 2) return "high";
  if (tempC <= 6) return "medium";
  return "low";
}

/**
 * Rule-based summary of a day: wind sentence, rain sentence and, for the
 * variants that carry one, an overnight temperature sentence.
 */
export function buildConditionsSummary(input: SummaryInput, variant: SummaryVariant): string {
  const phrases = PHRASES[variant];
  const parts = [phrases.wind[windBand(input)], phrases.rain[rainBand(input)]];

  if (phrases.temperature && input.overnightTempC != null) {
    parts.push(phrases.temperature[temperatureBand(input.overnightTempC)]);
  }

  return parts.join(" ");
}
