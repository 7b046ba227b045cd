import { setLogLevel } from '@/utils/logger';

setLogLevel('off');
