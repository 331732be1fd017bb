import type { Report } from "research-loop-core";

const bullets = (items: readonly string[]) => (items.length ? items.map((s) => `- ${s}`).join("\n") : "(none)");

export function formatReport(report: Report) {
  const sections: [title: string, body: string][] = [
    ["REPORT SUMMARY", report.shortSummary],
    ["REPORT OUTLINE", report.outline],
    ["FULL REPORT", report.fullReport],
    ["RESEARCH LIMITATIONS", bullets(report.limitations)],
    ["FOLLOW UP QUESTIONS", bullets(report.followUps)],
  ];
  return sections
    .map(([title, body]) => `=====${title}=====\n\n${body}`)
    .join("\n\n\n");
}
