export { SummaryService } from './summary.service';
