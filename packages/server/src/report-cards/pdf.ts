import { jsPDF } from "jspdf";
import type { ReportCard } from "./report-card-manager.js";

export interface ReportCardPdfContext {
  studentName: string;
  teacherName: string;
  generatedAt: Date;
}

const formatFileName = (value: string) =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/(^-|-$)/g, "");

/** `ada-lovelace-fall-term.pdf` */
export function reportCardFileName(studentName: string, title: string): string {
  return `${formatFileName(`${studentName} ${title}`) || "report-card"}.pdf`;
}

const formatScore = (score: number | null) => (score === null ? "-" : String(score));

/**
 * Render a report card as an A4 PDF: header, period, entries table, average,
 * comments and attendance.
 */
export function renderReportCardPdf(card: ReportCard, context: ReportCardPdfContext): Buffer {
  const doc = new jsPDF({ orientation: "p", unit: "mm", format: "a4" });
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  const left = 16;
  const right = pageWidth - 16;
  let y = 20;

  doc.setFont("helvetica", "bold");
  doc.setTextColor(15, 23, 42);
  doc.setFontSize(16);
  doc.text(card.title, left, y);
  doc.setFont("helvetica", "normal");
  doc.setFontSize(10);
  doc.setTextColor(51, 65, 85);
  doc.text(`School year ${card.schoolYear}`, right, y, { align: "right" });

  y += 10;
  doc.setFontSize(10.5);
  doc.setTextColor(15, 23, 42);
  doc.text(`Student: ${context.studentName}`, left, y);
  doc.text(`Teacher: ${context.teacherName}`, 105, y);
  y += 5;
  const period =
    card.periodStart || card.periodEnd ? `${card.periodStart ?? "?"} to ${card.periodEnd ?? "?"}` : "-";
  doc.text(`Period: ${period}`, left, y);
  doc.text(`Status: ${card.status}`, 105, y);

  // Entries table
  y += 10;
  const columns = [
    { label: "Subject", x: left },
    { label: "Score", x: 100 },
    { label: "Grade", x: 120 },
    { label: "Comments", x: 138 },
  ];
  doc.setFillColor(241, 245, 249);
  doc.rect(left - 2, y - 5, right - left + 4, 7, "F");
  doc.setFont("helvetica", "bold");
  for (const column of columns) {
    doc.text(column.label, column.x, y);
  }
  doc.setFont("helvetica", "normal");
  y += 7;

  if (card.entries.length === 0) {
    doc.text("No subjects recorded", left, y);
    y += 6;
  }
  for (const entry of card.entries) {
    const comments: string[] = doc.splitTextToSize(entry.comments ?? "", right - 138);
    const rowHeight = Math.max(1, comments.length) * 5 + 1;
    if (y + rowHeight > pageHeight - 20) {
      doc.addPage();
      y = 20;
    }
    doc.text(entry.subjectName, left, y);
    doc.text(formatScore(entry.score), 100, y);
    doc.text(entry.grade ?? "-", 120, y);
    if (comments.length > 0) doc.text(comments, 138, y);
    y += rowHeight;
  }

  y += 4;
  doc.setDrawColor(203, 213, 225);
  doc.line(left, y - 4, right, y - 4);
  doc.setFont("helvetica", "bold");
  doc.text(`Average: ${formatScore(card.averageScore)}`, left, y);
  doc.text(`Overall grade: ${card.overallGrade ?? "-"}`, 105, y);
  doc.setFont("helvetica", "normal");

  y += 8;
  doc.text(
    `Attendance: ${card.daysPresent ?? "-"} days present, ${card.daysAbsent ?? "-"} days absent`,
    left,
    y,
  );

  if (card.overallComments) {
    y += 10;
    doc.setFont("helvetica", "bold");
    doc.text("Comments", left, y);
    doc.setFont("helvetica", "normal");
    y += 6;
    const lines: string[] = doc.splitTextToSize(card.overallComments, right - left);
    doc.text(lines, left, y);
  }

  doc.setFontSize(8);
  doc.setTextColor(100, 116, 139);
  doc.text(`Generated ${context.generatedAt.toISOString().slice(0, 10)}`, left, pageHeight - 10);

  return Buffer.from(doc.output("arraybuffer"));
}
