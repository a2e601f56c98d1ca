import type { CareerDefinition, PartTimeJobDefinition, VehicleDefinition } from '../engine/types';

// ── Careers (salaries are annual) ──

export const CAREERS: CareerDefinition[] = [
  { id: 'software_developer', title: 'Software Developer', track: 'bachelor_degree', startingSalary: 72000, skillTags: ['programming', 'problem_solving'] },
  { id: 'staff_accountant', title: 'Staff Accountant', track: 'bachelor_degree', startingSalary: 55000, skillTags: ['finance', 'detail'] },
  { id: 'teacher', title: 'Teacher', track: 'bachelor_degree', startingSalary: 44000, skillTags: ['communication', 'planning'] },
  { id: 'registered_nurse', title: 'Registered Nurse', track: 'associate_degree', startingSalary: 62000, skillTags: ['healthcare', 'care'] },
  { id: 'paralegal', title: 'Paralegal', track: 'associate_degree', startingSalary: 45000, skillTags: ['research', 'writing'] },
  { id: 'it_support', title: 'IT Support Specialist', track: 'associate_degree', startingSalary: 42000, skillTags: ['technology', 'support'] },
  { id: 'electrician', title: 'Electrician', track: 'trade_school', startingSalary: 50000, skillTags: ['electrical', 'safety'] },
  { id: 'hvac_technician', title: 'HVAC Technician', track: 'trade_school', startingSalary: 46000, skillTags: ['mechanical', 'diagnostics'] },
  { id: 'welder', title: 'Welder', track: 'trade_school', startingSalary: 43000, skillTags: ['fabrication', 'safety'] },
  { id: 'logistics_specialist', title: 'Logistics Specialist', track: 'military', startingSalary: 38000, skillTags: ['logistics', 'discipline'] },
  { id: 'retail_supervisor', title: 'Retail Supervisor', track: 'high_school_entry', startingSalary: 34000, skillTags: ['leadership', 'customer_service'] },
  { id: 'small_business_owner', title: 'Small Business Owner', track: 'business', startingSalary: 40000, skillTags: ['sales', 'management'] },
];

// ── Vehicles ──

export const VEHICLES: VehicleDefinition[] = [
  { id: 'used_sedan', name: 'Used sedan', purchaseCost: 6000, monthlyCost: 250, monthlyDecay: 2 },
  { id: 'used_truck', name: 'Used pickup truck', purchaseCost: 9000, monthlyCost: 320, monthlyDecay: 2 },
  { id: 'new_compact', name: 'New compact car', purchaseCost: 20000, monthlyCost: 400, monthlyDecay: 1 },
  { id: 'scooter', name: 'Scooter', purchaseCost: 1500, monthlyCost: 60, monthlyDecay: 3 },
];

// ── Part-time jobs ──
// An empty compatiblePaths list means any education path

export const PART_TIME_JOBS: PartTimeJobDefinition[] = [
  { id: 'campus_library', title: 'Campus library assistant', hourlyWage: 12, hoursPerWeek: 10, compatiblePaths: ['four_year_college', 'community_college'] },
  { id: 'barista', title: 'Barista', hourlyWage: 13, hoursPerWeek: 15, compatiblePaths: [] },
  { id: 'retail_associate', title: 'Retail associate', hourlyWage: 14, hoursPerWeek: 20, compatiblePaths: [] },
  { id: 'shop_apprentice', title: 'Shop apprentice', hourlyWage: 16, hoursPerWeek: 20, compatiblePaths: ['trade_school'] },
  { id: 'delivery_driver', title: 'Delivery driver', hourlyWage: 17, hoursPerWeek: 25, compatiblePaths: [] },
];
