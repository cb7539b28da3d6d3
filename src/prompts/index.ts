import type { MetadataField } from "../modules/documents/types.js";

export const FIELD_LABELS: Record<MetadataField, string> = {
  courtName: "Məhkəmə",
  caseNumber: "İş nömrəsi",
  judge: "Hakim",
  clerk: "Katib",
  caseType: "İşin növü",
  district: "Rayon",
  decisionType: "Qərarın növü",
  year: "İl",
  decisionDate: "Qərarın tarixi",
  parties: "Tərəf"
};

export const BEST_EFFORT_NOTICE =
  "Dəqiqləşdirmə tamamlanmadı; ən çox ehtimal olunan dəyər əsasında axtarış aparıldı.";

export const buildClarificationPrompt = (field: MetadataField, candidates: readonly string[]): string =>
  [
    `${FIELD_LABELS[field]} üzrə bir neçə uyğun dəyər tapıldı. Hansını nəzərdə tutursunuz?`,
    ...candidates.map((candidate, index) => `${index + 1}. ${candidate}`),
    "Nömrəni və ya tam adı yazın."
  ].join("\n");

export const CANNED_QUERY_SUGGESTIONS: readonly string[] = [
  "Mülki işlər üzrə qətnamələr",
  "İnzibati xəta işləri üzrə qərarlar",
  "Cinayət işləri üzrə hökmlər",
  "Kredit borcunun ödənilməsi barədə iddialar",
  "Aliment tutulması haqqında qətnamələr",
  "Əmək mübahisələri üzrə qərarlar",
  "Bakı Apellyasiya Məhkəməsinin qərarları",
  "2023-cü il qərarları"
];

export const buildJudgeSuggestion = (judge: string): string => `Hakim ${judge} tərəfindən çıxarılan qərarlar`;

export const buildCourtSuggestion = (courtName: string): string => `${courtName} qərarları`;
