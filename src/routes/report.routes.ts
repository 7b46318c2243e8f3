import { Router, Request, Response } from 'express';
import { upload } from '../config/multer';
import { settings } from '../config/settings';
import { InMemoryDrawingSource } from '../services/drawing-source';
import { WireDetectionService } from '../services/wire-detection.service';
import { WireReportPdfService } from '../services/wire-report-pdf.service';
import { errorMessage, parseDrawingRequest } from './request-parsing';

const router = Router();
const reportService = new WireReportPdfService();

/**
 * Analyse a drawing dump and stream back a PDF overlay of the traced wires
 */
router.post('/generate', upload.single('document'), async (req: Request, res: Response) => {
  try {
    const request = parseDrawingRequest(req);
    if (!request.success) {
      return res.status(400).json({ error: request.error, details: request.details });
    }

    const service = new WireDetectionService(
      InMemoryDrawingSource.fromDocument(request.document),
      { ...settings.detection, ...request.options }
    );
    const { pages } = service.analyzeDocument();

    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader('Content-Disposition', 'attachment; filename=wire-report.pdf');

    console.log(`[Report] Generating wire overlay for ${pages.length} pages (streaming mode)`);
    await reportService.generateReport(pages, res, {
      showOtherLines: req.query.otherLines !== 'false',
      labelPaths: req.query.labels !== 'false'
    });
  } catch (error) {
    console.error('[Report] Error generating PDF:', error);
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: errorMessage(error) });
  }
});

export const reportRouter = router;
