// Demo distribution network
import type { RawTable } from '@/types/facility';

export const DEMO_DATA: RawTable = {
  headers: ['name', 'longitude', 'latitude', 'transport_rate', 'mass', 'land_cost', 'road_access', 'labour_pool'],
  rows: [
    { name: 'Warszawa', longitude: 21.0122, latitude: 52.2297, transport_rate: 1.2, mass: 420, land_cost: 95, road_access: 9, labour_pool: 8.5 },
    { name: 'Łódź', longitude: 19.4560, latitude: 51.7592, transport_rate: 1.0, mass: 180, land_cost: 55, road_access: 10, labour_pool: 7 },
    { name: 'Kraków', longitude: 19.9450, latitude: 50.0647, transport_rate: 1.1, mass: 260, land_cost: 80, road_access: 7, labour_pool: 8 },
    { name: 'Poznań', longitude: 16.9252, latitude: 52.4064, transport_rate: 0.9, mass: 210, land_cost: 60, road_access: 8, labour_pool: 6.5 },
    { name: 'Gdańsk', longitude: 18.6466, latitude: 54.3520, transport_rate: 1.3, mass: 150, land_cost: 70, road_access: 6, labour_pool: 6 },
    { name: 'Wrocław', longitude: 17.0385, latitude: 51.1079, transport_rate: 1.0, mass: 230, land_cost: 65, road_access: 8, labour_pool: 7.5 },
    { name: 'Lublin', longitude: 22.5684, latitude: 51.2465, transport_rate: 1.4, mass: 90, land_cost: 40, road_access: 5, labour_pool: 5 },
  ],
};
