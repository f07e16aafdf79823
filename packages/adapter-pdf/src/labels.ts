export interface ReportLabels {
  bandTitle: string; // centre cell of the page band
  documentTitle: string;
  file: string;
  noErrors: string;
  columns: [message: string, solution: string, occurrences: string];
}

export const LABELS: Record<"fr" | "en", ReportLabels> = {
  fr: {
    bandTitle: "Rapport de Maintenance Préventive",
    documentTitle: "Rapport d'analyse des fichiers log",
    file: "Fichier",
    noErrors: "Aucune erreur trouvée",
    columns: ["Message représentatif", "Solution suggérée", "Occurrences"],
  },
  en: {
    bandTitle: "Preventive Maintenance Report",
    documentTitle: "Log file analysis report",
    file: "File",
    noErrors: "No errors found",
    columns: ["Representative message", "Suggested solution", "Occurrences"],
  },
};

export function labelsFor(language: string | undefined): ReportLabels {
  return (language ?? "fr").toLowerCase().startsWith("fr") ? LABELS.fr : LABELS.en;
}
