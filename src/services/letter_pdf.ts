import PDFDocument from 'pdfkit';

/** Renders a markdown letter to PDF: headings, bullets and paragraphs only. */
export function renderLetterPdf(markdown: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ margin: 60 });
        const buffers: Buffer[] = [];
        doc.on('data', chunk => buffers.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(buffers)));
        doc.on('error', reject);

        for (const line of markdown.split('\n')) {
            if (line.startsWith('## ')) {
                doc.moveDown(0.5).font('Helvetica-Bold').fontSize(13).text(line.slice(3));
                doc.moveDown(0.3);
            } else if (line.startsWith('### ')) {
                doc.font('Helvetica-Bold').fontSize(11).text(line.slice(4));
            } else if (/^\s+- /.test(line)) {
                doc.font('Helvetica').fontSize(10).text(`- ${line.trim().slice(2)}`, { indent: 30 });
            } else if (line.startsWith('- ')) {
                doc.font('Helvetica').fontSize(10).text(`• ${line.slice(2)}`, { indent: 12 });
            } else if (!line.trim()) {
                doc.moveDown(0.5);
            } else {
                doc.font('Helvetica').fontSize(11).text(line);
            }
        }

        doc.end();
    });
}
