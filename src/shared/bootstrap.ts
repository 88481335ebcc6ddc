import { container } from "./container";
import { env } from "./config/env";
import { mongoCertificateLedger, type CertificateLedger } from "../services/certificateLedger";
import { mongoTraineeDirectory, type TraineeDirectory } from "../services/traineeDirectory";
import { mongoTrainingCatalog, type TrainingCatalog } from "../services/trainingCatalog";
import { createCertificateRenderer, type CertificateRenderer } from "../services/certificateRenderer";
import { createCertificateIssuanceService } from "../services/certificateIssuanceService";

container.register("certificateLedger", () => mongoCertificateLedger);
container.register("traineeDirectory", () => mongoTraineeDirectory);
container.register("trainingCatalog", () => mongoTrainingCatalog);
container.register("certificateRenderer", () =>
  createCertificateRenderer({
    issuerName: env.CERTIFICATE_ISSUER_NAME,
    programName: env.CERTIFICATE_PROGRAM_NAME,
    verifyUrl: env.CERTIFICATE_VERIFY_URL,
    fontPath: env.CERTIFICATE_FONT_PATH,
  })
);
container.register("certificateIssuanceService", () =>
  createCertificateIssuanceService({
    ledger: container.resolve<CertificateLedger>("certificateLedger"),
    trainees: container.resolve<TraineeDirectory>("traineeDirectory"),
    trainings: container.resolve<TrainingCatalog>("trainingCatalog"),
    render: container.resolve<CertificateRenderer>("certificateRenderer"),
    maxIdAttempts: env.CERTIFICATE_ID_MAX_ATTEMPTS,
  })
);
