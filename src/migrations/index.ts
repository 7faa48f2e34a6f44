import { CreateGenerationJobs1760860800000 } from './1760860800000-CreateGenerationJobs';
import { CreateOrphanCallbacks1760860860000 } from './1760860860000-CreateOrphanCallbacks';
import { CreateBilling1760860920000 } from './1760860920000-CreateBilling';
import { CreateServiceLeases1760860980000 } from './1760860980000-CreateServiceLeases';
import { AddDeliveryProgress1760861040000 } from './1760861040000-AddDeliveryProgress';
import { AddOrphanStatus1760861100000 } from './1760861100000-AddOrphanStatus';

// Порядок применения определяется временной меткой в имени класса
export const migrations = [
  CreateGenerationJobs1760860800000,
  CreateOrphanCallbacks1760860860000,
  CreateBilling1760860920000,
  CreateServiceLeases1760860980000,
  AddDeliveryProgress1760861040000,
  AddOrphanStatus1760861100000,
];
